import {
    GraphValidationError,
    type ActionFn,
    type ActionNode,
    type Condition,
    type ParallelNode,
    type Transition,
    type WorkflowNode,
} from '../types/workflow.js';

export function action(name: string, run: ActionFn): ActionNode {
    return { kind: 'action', name, run };
}

export function parallel(name: string, branches: string[], options: { join?: string } = {}): ParallelNode {
    return { kind: 'parallel', name, branches: [...branches], join: options.join };
}

/** Unconditional transition guard. */
export function always(): Condition {
    return () => true;
}

/**
 * Immutable-at-run-time description of nodes and the transitions between
 * them. A graph carries no run state and can back any number of executions.
 *
 * Transitions are validated when added. Parallel branch and join references
 * are checked by {@link validate}, which the executor runs before the first
 * step, so branches may be declared after the parallel node that names them.
 */
export class WorkflowGraph {
    readonly #nodes: Map<string, WorkflowNode> = new Map();
    readonly #transitions: Map<string, Transition[]> = new Map();
    #start: string | null = null;

    addNode(node: WorkflowNode): this {
        const name = node.name.trim();
        if (!name) {
            throw new GraphValidationError('[Graph] Node name must be a non-empty string.');
        }
        if (name !== node.name) {
            throw new GraphValidationError(`[Graph] Node name '${node.name}' has surrounding whitespace.`);
        }
        if (this.#nodes.has(name)) {
            throw new GraphValidationError(`[Graph] Duplicate node '${name}'.`);
        }

        this.#nodes.set(name, node.kind === 'parallel' ? { ...node, branches: [...node.branches] } : { ...node });
        this.#transitions.set(name, []);
        return this;
    }

    addTransition(from: string, to: string, condition: Condition = always()): this {
        if (!this.#nodes.has(from)) {
            throw new GraphValidationError(`[Graph] Transition source '${from}' is not a node.`);
        }
        if (!this.#nodes.has(to)) {
            throw new GraphValidationError(`[Graph] Transition target '${to}' is not a node.`);
        }

        this.#transitions.get(from)?.push({ from, to, condition });
        return this;
    }

    setStart(name: string): this {
        if (!this.#nodes.has(name)) {
            throw new GraphValidationError(`[Graph] Start node '${name}' is not a node.`);
        }
        this.#start = name;
        return this;
    }

    /** Explicit start, else the first node added. */
    get start(): string | null {
        if (this.#start) return this.#start;
        const first = this.#nodes.keys().next();
        return first.done ? null : first.value;
    }

    node(name: string): WorkflowNode | undefined {
        return this.#nodes.get(name);
    }

    nodes(): WorkflowNode[] {
        return [...this.#nodes.values()];
    }

    /** Outgoing transitions of `name` in registration order. */
    outgoing(name: string): readonly Transition[] {
        return this.#transitions.get(name) ?? [];
    }

    /** Throws {@link GraphValidationError} describing the first problem found. */
    validate(): void {
        if (this.#nodes.size === 0) {
            throw new GraphValidationError('[Graph] Graph has no nodes.');
        }

        for (const node of this.#nodes.values()) {
            if (node.kind !== 'parallel') continue;

            if (node.branches.length === 0) {
                throw new GraphValidationError(`[Graph] Parallel node '${node.name}' has no branches.`);
            }
            const seen = new Set<string>();
            for (const branch of node.branches) {
                if (!this.#nodes.has(branch)) {
                    throw new GraphValidationError(
                        `[Graph] Parallel node '${node.name}' references missing branch '${branch}'.`,
                    );
                }
                if (branch === node.name) {
                    throw new GraphValidationError(`[Graph] Parallel node '${node.name}' cannot branch to itself.`);
                }
                if (seen.has(branch)) {
                    throw new GraphValidationError(
                        `[Graph] Parallel node '${node.name}' lists branch '${branch}' more than once.`,
                    );
                }
                seen.add(branch);
            }
            if (node.join !== undefined) {
                if (!this.#nodes.has(node.join)) {
                    throw new GraphValidationError(
                        `[Graph] Parallel node '${node.name}' references missing join '${node.join}'.`,
                    );
                }
                if (node.join === node.name || seen.has(node.join)) {
                    throw new GraphValidationError(
                        `[Graph] Join '${node.join}' of parallel node '${node.name}' must differ from the node and its branches.`,
                    );
                }
            }
        }
    }

    /**
     * Join node of a parallel node: the explicit `join`, else the node reachable
     * from every branch with the smallest worst-case distance (ties go to the
     * earlier-added node). Null when the branches never converge.
     */
    resolveJoin(node: ParallelNode): string | null {
        if (node.join !== undefined) return node.join;

        const excluded = new Set([node.name, ...node.branches]);
        const distances = node.branches.map((branch) => this.#distancesFrom(branch));

        let best: string | null = null;
        let bestDistance = Number.POSITIVE_INFINITY;
        for (const candidate of this.#nodes.keys()) {
            if (excluded.has(candidate)) continue;

            let worst = 0;
            let reachable = true;
            for (const map of distances) {
                const distance = map.get(candidate);
                if (distance === undefined) {
                    reachable = false;
                    break;
                }
                worst = Math.max(worst, distance);
            }
            if (reachable && worst < bestDistance) {
                best = candidate;
                bestDistance = worst;
            }
        }
        return best;
    }

    #distancesFrom(origin: string): Map<string, number> {
        const distances = new Map<string, number>([[origin, 0]]);
        const queue = [origin];
        while (queue.length > 0) {
            const current = queue.shift();
            if (current === undefined) continue;
            const distance = distances.get(current) ?? 0;
            for (const transition of this.outgoing(current)) {
                if (!distances.has(transition.to)) {
                    distances.set(transition.to, distance + 1);
                    queue.push(transition.to);
                }
            }
        }
        return distances;
    }
}
