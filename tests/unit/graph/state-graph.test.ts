import { describe, it, expect } from 'vitest';
import { StateGraph } from '../../../src/graph/state-graph';
import { CompiledGraph } from '../../../src/graph/executor';
import { append, merge, overwrite, type StateSchema } from '../../../src/graph/channels';
import { END } from '../../../src/graph/types';
import { BuildError } from '../../../src/lib/errors';

interface LoopState {
    iteration: number;
    log: string[];
    sections: Record<string, string>;
}

const schema: StateSchema<LoopState> = {
    iteration: overwrite<number>(),
    log: append<string>(),
    sections: merge<string>(),
};

const noop = () => undefined;

function graph(): StateGraph<LoopState> {
    return new StateGraph<LoopState>(schema);
}

describe('StateGraph', () => {
    describe('compile', () => {
        it('should compile a valid graph', () => {
            const compiled = graph()
                .addNode('a', noop)
                .addNode('b', noop)
                .addEdge('a', 'b')
                .compile();

            expect(compiled).toBeInstanceOf(CompiledGraph);
            expect(compiled.definition.entryPoint).toBe('a');
            expect(compiled.definition.maxWaves).toBe(100);
        });

        it('should use the first node as the default entry point', () => {
            const compiled = graph().addNode('first', noop).addNode('second', noop).compile();

            expect(compiled.definition.entryPoint).toBe('first');
        });

        it('should honour an explicit entry point', () => {
            const compiled = graph()
                .addNode('first', noop)
                .addNode('second', noop)
                .setEntryPoint('second')
                .compile();

            expect(compiled.definition.entryPoint).toBe('second');
        });

        it('should record fan-in predecessors', () => {
            const compiled = graph()
                .addNode('plan', noop)
                .addNode('left', noop)
                .addNode('right', noop)
                .addNode('join', noop)
                .addEdge('plan', 'left')
                .addEdge('plan', 'right')
                .addEdge('left', 'join')
                .addEdge('right', 'join')
                .compile();

            expect(compiled.definition.predecessors.get('join')).toEqual(['left', 'right']);
            expect(compiled.definition.successors.get('plan')).toEqual(['left', 'right']);
        });

        it('should freeze the compiled definition', () => {
            const compiled = graph().addNode('a', noop).compile();

            expect(Object.isFrozen(compiled.definition)).toBe(true);
            expect(Object.isFrozen(compiled.definition.nodes.get('a'))).toBe(true);
        });

        it('should not be affected by later builder changes', () => {
            const builder = graph().addNode('a', noop);
            const compiled = builder.compile();
            builder.addNode('b', noop);

            expect([...compiled.definition.nodes.keys()]).toEqual(['a']);
        });
    });

    describe('build validation', () => {
        it('should reject an empty graph', () => {
            expect(() => graph().compile()).toThrow(new BuildError('Graph has no entry point'));
        });

        it('should reject duplicate node names', () => {
            expect(() => graph().addNode('a', noop).addNode('a', noop).compile())
                .toThrow('Duplicate node name "a"');
        });

        it('should reject reserved node names', () => {
            expect(() => graph().addNode('__end__', noop).compile()).toThrow('Node name "__end__" is reserved');
        });

        it('should reject an unknown entry point', () => {
            expect(() => graph().addNode('a', noop).setEntryPoint('missing').compile())
                .toThrow('Entry point "missing" is not a declared node');
        });

        it('should reject dangling edges', () => {
            expect(() => graph().addNode('a', noop).addEdge('a', 'ghost').compile())
                .toThrow('Edge target "ghost" is not a declared node');
            expect(() => graph().addNode('a', noop).addEdge('ghost', 'a').compile())
                .toThrow('Edge source "ghost" is not a declared node');
        });

        it('should reject more than one conditional edge on a node', () => {
            const build = () => graph()
                .addNode('a', noop)
                .addConditionalEdges('a', () => 'done', { done: END })
                .addConditionalEdges('a', () => 'done', { done: END })
                .compile();

            expect(build).toThrow('Node "a" has more than one conditional edge');
        });

        it('should reject mixing conditional and unconditional edges', () => {
            const build = () => graph()
                .addNode('a', noop)
                .addNode('b', noop)
                .addEdge('a', 'b')
                .addConditionalEdges('a', () => 'done', { done: END })
                .compile();

            expect(build).toThrow('Node "a" mixes conditional and unconditional edges');
        });

        it('should reject route targets that are not declared', () => {
            const build = () => graph()
                .addNode('a', noop)
                .addConditionalEdges('a', () => 'next', { next: 'nowhere' })
                .compile();

            expect(build).toThrow('Route "next" of "a" targets unknown node "nowhere"');
        });

        it('should reject an empty route table', () => {
            const routes: Record<string, string> = {};
            const build = () => graph()
                .addNode('a', noop)
                .addConditionalEdges<string>('a', () => 'x', routes)
                .compile();

            expect(build).toThrow('Conditional edge of "a" has an empty route table');
        });

        it('should reject a ceiling on a field that is not overwrite', () => {
            interface Counter {
                iteration: number;
            }
            const build = () => new StateGraph<Counter>({
                iteration: { strategy: 'append', reduce: (current, update) => (current ?? 0) + update },
            })
                .addNode('a', noop)
                .compile({ ceiling: { field: 'iteration', maxIterations: 2 } });

            expect(build).toThrow('Ceiling field "iteration" uses the "append" strategy; a loop counter must be "overwrite"');
        });

        it('should reject a negative ceiling', () => {
            const build = () => graph()
                .addNode('a', noop)
                .compile({ ceiling: { field: 'iteration', maxIterations: -1 } });

            expect(build).toThrow('Ceiling maxIterations must be a non-negative integer, got -1');
        });

        it('should reject invalid engine limits', () => {
            expect(() => graph().addNode('a', noop).compile({ maxWaves: 0 }))
                .toThrow('maxWaves must be a positive integer, got 0');
            expect(() => graph().addNode('a', noop).compile({ maxConcurrency: 1.5 }))
                .toThrow('maxConcurrency must be a positive integer, got 1.5');
            expect(() => graph().addNode('a', noop).compile({ nodeTimeoutMs: -5 }))
                .toThrow('nodeTimeoutMs must be positive, got -5');
            expect(() => graph().addNode('a', noop).compile({ nodeTimeoutMs: 3_000_000_000 }))
                .toThrow('nodeTimeoutMs must not exceed 2147483647, got 3000000000');
            expect(() => graph().addNode('a', noop).compile({ nodeTimeoutMs: Infinity }))
                .toThrow('nodeTimeoutMs must not exceed 2147483647, got Infinity');
        });

        it('should reject a node timeout setTimeout cannot honour', () => {
            expect(() => graph().addNode('a', noop, { timeoutMs: 2_147_483_648 }).compile())
                .toThrow('Node "a" timeoutMs must not exceed 2147483647, got 2147483648');
            expect(() => graph().addNode('a', noop, { timeoutMs: 0 }).compile())
                .toThrow('Node "a" timeoutMs must be positive, got 0');
        });

        it('should reject an invalid retry policy', () => {
            expect(() => graph().addNode('a', noop, { retry: { maxAttempts: 0 } }).compile())
                .toThrow('Node "a" retry maxAttempts must be a positive integer');
        });

        it('should raise BuildError instances', () => {
            try {
                graph().addNode('a', noop).addEdge('a', 'ghost').compile();
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(BuildError);
            }
        });
    });
});
