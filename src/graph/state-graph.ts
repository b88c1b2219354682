/**
 * StateGraph - graph builder with build-time validation.
 *
 * Nodes run in waves: every node made ready by the previous wave runs
 * concurrently, and updates are merged in declaration order.
 */

import { BuildError } from '../lib/errors';
import type { StateSchema } from './channels';
import { describeSchema } from './channels';
import { CompiledGraph, checkEngineOptions, checkTimeout } from './executor';
import type {
    CompileOptions,
    ConditionalEdge,
    GraphDefinition,
    GraphEdge,
    GraphNode,
    NodeFunction,
    NodeOptions,
    Router,
    StateGraphConfig,
    Target,
} from './types';
import { END } from './types';

/** Names the engine keeps for itself */
export const RESERVED_NODE_NAMES: readonly string[] = ['__start__', '__end__'];

interface ConditionalDeclaration<S> {
    from: string;
    router: Router<S>;
    routes: Array<[string, Target]>;
}

/**
 * StateGraph builder.
 *
 * @example
 * ```typescript
 * const graph = new StateGraph(schema)
 *     .addNode('plan', plan)
 *     .addNode('review', review)
 *     .addEdge('plan', 'review')
 *     .addConditionalEdges('review', s => s.approved ? 'done' : 'again', {
 *         done: END,
 *         again: 'plan',
 *     })
 *     .compile({ ceiling: { field: 'iteration', maxIterations: 2 } });
 * ```
 */
export class StateGraph<S extends object> {
    private readonly declared: Array<GraphNode<S>> = [];
    private readonly edges: GraphEdge[] = [];
    private readonly conditionals: Array<ConditionalDeclaration<S>> = [];
    private entryPoint: string | null = null;

    constructor(private readonly schema: StateSchema<S>, config: StateGraphConfig = {}) {
        if (config.entryPoint) {
            this.entryPoint = config.entryPoint;
        }
    }

    /**
     * Add a work node. The first node added is the default entry point.
     */
    addNode(name: string, fn: NodeFunction<S>, options: NodeOptions = {}): this {
        this.declared.push({
            name,
            fn,
            index: this.declared.length,
            retry: options.retry,
            timeoutMs: options.timeoutMs,
        });

        if (!this.entryPoint) {
            this.entryPoint = name;
        }

        return this;
    }

    /**
     * Add an unconditional edge. Several edges out of one node fan out;
     * several edges into one node make it a join.
     */
    addEdge(from: string, to: Target): this {
        this.edges.push({ from, to });
        return this;
    }

    /**
     * Make `from` a decision node. After its wave merges, `router` picks
     * a label and `routes` maps it to the next node or END.
     */
    addConditionalEdges<L extends string>(
        from: string,
        router: Router<S, NoInfer<L>>,
        routes: Record<L, Target>
    ): this {
        const table: Array<[string, Target]> = Object.entries<Target>(routes);
        this.conditionals.push({ from, router, routes: table });
        return this;
    }

    /**
     * Set the entry point.
     */
    setEntryPoint(name: string): this {
        this.entryPoint = name;
        return this;
    }

    /**
     * Validate the graph and freeze it into an executable form.
     * @throws BuildError for any structural defect
     */
    compile(options: CompileOptions<S> = {}): CompiledGraph<S> {
        const nodes = this.collectNodes();

        if (!this.entryPoint) {
            throw new BuildError('Graph has no entry point');
        }
        if (!nodes.has(this.entryPoint)) {
            throw new BuildError(`Entry point "${this.entryPoint}" is not a declared node`);
        }

        const successors = new Map<string, Target[]>();
        const predecessors = new Map<string, string[]>();
        for (const name of nodes.keys()) {
            successors.set(name, []);
            predecessors.set(name, []);
        }

        for (const edge of this.edges) {
            const outgoing = successors.get(edge.from);
            if (!outgoing) {
                throw new BuildError(`Edge source "${edge.from}" is not a declared node`);
            }
            if (edge.to !== END) {
                const incoming = predecessors.get(edge.to);
                if (!incoming) {
                    throw new BuildError(`Edge target "${edge.to}" is not a declared node`);
                }
                if (incoming.includes(edge.from)) {
                    throw new BuildError(`Duplicate edge "${edge.from}" -> "${edge.to}"`);
                }
                incoming.push(edge.from);
            } else if (outgoing.includes(END)) {
                throw new BuildError(`Duplicate edge "${edge.from}" -> END`);
            }
            outgoing.push(edge.to);
        }

        const conditionalEdges = new Map<string, ConditionalEdge<S>>();
        for (const declaration of this.conditionals) {
            const { from } = declaration;
            if (!nodes.has(from)) {
                throw new BuildError(`Conditional edge source "${from}" is not a declared node`);
            }
            if (conditionalEdges.has(from)) {
                throw new BuildError(`Node "${from}" has more than one conditional edge`);
            }
            if (successors.get(from)?.length) {
                throw new BuildError(`Node "${from}" mixes conditional and unconditional edges`);
            }
            if (declaration.routes.length === 0) {
                throw new BuildError(`Conditional edge of "${from}" has an empty route table`);
            }
            for (const [label, target] of declaration.routes) {
                if (target !== END && !nodes.has(target)) {
                    throw new BuildError(`Route "${label}" of "${from}" targets unknown node "${target}"`);
                }
            }
            conditionalEdges.set(from, Object.freeze({
                from,
                router: declaration.router,
                routes: new Map(declaration.routes),
            }));
        }

        const { ceiling } = options;
        if (ceiling) {
            const strategies = describeSchema(this.schema);
            const strategy = strategies[ceiling.field];
            if (strategy === undefined) {
                throw new BuildError(`Ceiling field "${ceiling.field}" is not a state field`);
            }
            if (strategy !== 'overwrite') {
                throw new BuildError(
                    `Ceiling field "${ceiling.field}" uses the "${strategy}" strategy; a loop counter must be "overwrite"`
                );
            }
            if (!Number.isInteger(ceiling.maxIterations) || ceiling.maxIterations < 0) {
                throw new BuildError(`Ceiling maxIterations must be a non-negative integer, got ${ceiling.maxIterations}`);
            }
        }

        const invalid = checkEngineOptions(options);
        if (invalid) {
            throw new BuildError(invalid);
        }

        const definition: GraphDefinition<S> = Object.freeze({
            schema: this.schema,
            entryPoint: this.entryPoint,
            nodes,
            successors: freezeLists(successors),
            predecessors: freezeLists(predecessors),
            conditionalEdges,
            ceiling: ceiling ? Object.freeze({ ...ceiling }) : undefined,
            maxWaves: options.maxWaves ?? 100,
            maxConcurrency: options.maxConcurrency,
            nodeTimeoutMs: options.nodeTimeoutMs,
        });

        return new CompiledGraph(definition);
    }

    private collectNodes(): Map<string, GraphNode<S>> {
        const nodes = new Map<string, GraphNode<S>>();
        for (const node of this.declared) {
            if (!node.name.trim()) {
                throw new BuildError('Node name must not be empty');
            }
            if (RESERVED_NODE_NAMES.includes(node.name)) {
                throw new BuildError(`Node name "${node.name}" is reserved`);
            }
            if (nodes.has(node.name)) {
                throw new BuildError(`Duplicate node name "${node.name}"`);
            }
            if (node.retry && (!Number.isInteger(node.retry.maxAttempts) || node.retry.maxAttempts < 1)) {
                throw new BuildError(`Node "${node.name}" retry maxAttempts must be a positive integer`);
            }
            const badTimeout = node.timeoutMs === undefined ? undefined : checkTimeout('timeoutMs', node.timeoutMs);
            if (badTimeout) {
                throw new BuildError(`Node "${node.name}" ${badTimeout}`);
            }
            nodes.set(node.name, Object.freeze({ ...node }));
        }
        return nodes;
    }
}

function freezeLists<T>(map: Map<string, T[]>): Map<string, ReadonlyArray<T>> {
    const frozen = new Map<string, ReadonlyArray<T>>();
    for (const [key, list] of map) {
        frozen.set(key, Object.freeze([...list]));
    }
    return frozen;
}
