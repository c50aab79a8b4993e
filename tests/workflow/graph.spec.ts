import { describe, expect, it } from 'vitest';
import { GraphValidationError } from '../../src/types/workflow.js';
import { WorkflowGraph, action, always, parallel } from '../../src/workflow/graph.js';

const noop = () => undefined;

describe('WorkflowGraph', () => {
    it('rejects blank, padded and duplicate node names', () => {
        const graph = new WorkflowGraph();
        graph.addNode(action('fetch', noop));

        expect(() => graph.addNode(action('', noop))).toThrow(GraphValidationError);
        expect(() => graph.addNode(action('   ', noop))).toThrow(GraphValidationError);
        expect(() => graph.addNode(action(' fetch', noop))).toThrow(/surrounding whitespace/);
        expect(() => graph.addNode(action('fetch', noop))).toThrow("[Graph] Duplicate node 'fetch'.");
    });

    it('validates transition endpoints when they are added', () => {
        const graph = new WorkflowGraph().addNode(action('a', noop));

        expect(() => graph.addTransition('a', 'missing')).toThrow("[Graph] Transition target 'missing' is not a node.");
        expect(() => graph.addTransition('ghost', 'a')).toThrow("[Graph] Transition source 'ghost' is not a node.");
        expect(graph.outgoing('a')).toHaveLength(0);
    });

    it('keeps outgoing transitions in registration order', () => {
        const graph = new WorkflowGraph()
            .addNode(action('a', noop))
            .addNode(action('b', noop))
            .addNode(action('c', noop))
            .addTransition('a', 'c', always())
            .addTransition('a', 'b');

        expect(graph.outgoing('a').map((t) => t.to)).toEqual(['c', 'b']);
    });

    it('starts at the first node unless a start is set', () => {
        const graph = new WorkflowGraph().addNode(action('first', noop)).addNode(action('second', noop));
        expect(graph.start).toBe('first');

        graph.setStart('second');
        expect(graph.start).toBe('second');
        expect(() => graph.setStart('nope')).toThrow(GraphValidationError);
        expect(new WorkflowGraph().start).toBeNull();
    });

    it('allows branches declared after their parallel node and checks them on validate', () => {
        const graph = new WorkflowGraph().addNode(parallel('fan', ['left', 'right']));
        expect(() => graph.validate()).toThrow("[Graph] Parallel node 'fan' references missing branch 'left'.");

        graph.addNode(action('left', noop)).addNode(action('right', noop));
        expect(() => graph.validate()).not.toThrow();
    });

    it('rejects malformed parallel nodes', () => {
        const empty = new WorkflowGraph().addNode(parallel('fan', []));
        expect(() => empty.validate()).toThrow("[Graph] Parallel node 'fan' has no branches.");

        const self = new WorkflowGraph().addNode(parallel('fan', ['fan']));
        expect(() => self.validate()).toThrow("[Graph] Parallel node 'fan' cannot branch to itself.");

        const repeated = new WorkflowGraph().addNode(parallel('fan', ['a', 'a'])).addNode(action('a', noop));
        expect(() => repeated.validate()).toThrow(/more than once/);

        const badJoin = new WorkflowGraph()
            .addNode(parallel('fan', ['a'], { join: 'a' }))
            .addNode(action('a', noop));
        expect(() => badJoin.validate()).toThrow(/must differ from the node and its branches/);

        expect(() => new WorkflowGraph().validate()).toThrow('[Graph] Graph has no nodes.');
    });

    it('infers the nearest node every branch reaches as the join', () => {
        const graph = new WorkflowGraph()
            .addNode(parallel('fan', ['a', 'b']))
            .addNode(action('a', noop))
            .addNode(action('b', noop))
            .addNode(action('b2', noop))
            .addNode(action('merge', noop))
            .addNode(action('after', noop))
            .addTransition('a', 'merge')
            .addTransition('b', 'b2')
            .addTransition('b2', 'merge')
            .addTransition('merge', 'after');

        const fan = graph.node('fan');
        expect(fan?.kind).toBe('parallel');
        if (fan?.kind !== 'parallel') return;
        expect(graph.resolveJoin(fan)).toBe('merge');
    });

    it('prefers an explicit join and returns null when branches never meet', () => {
        const graph = new WorkflowGraph()
            .addNode(parallel('fan', ['a', 'b']))
            .addNode(parallel('pinned', ['a', 'b'], { join: 'end' }))
            .addNode(action('a', noop))
            .addNode(action('b', noop))
            .addNode(action('end', noop));

        const fan = graph.node('fan');
        const pinned = graph.node('pinned');
        if (fan?.kind !== 'parallel' || pinned?.kind !== 'parallel') {
            throw new Error('expected parallel nodes');
        }
        expect(graph.resolveJoin(fan)).toBeNull();
        expect(graph.resolveJoin(pinned)).toBe('end');
    });
});
