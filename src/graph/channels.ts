/**
 * State Store - typed state schema with per-field merge strategies.
 *
 * Every field is declared once with one of three channels:
 * - `overwrite()` last writer wins
 * - `append()`    values accumulate in merge order
 * - `merge()`     shallow key merge into a mapping
 *
 * Updates are applied without mutating the input state.
 */

import { StateUpdateError } from '../lib/errors';
import { isRecord } from '../lib/utils';

export type MergeStrategy = 'overwrite' | 'append' | 'merge';

/** Field declaration */
export interface Channel<V> {
    readonly strategy: MergeStrategy;
    /** Combine the current value with an update value */
    readonly reduce: (current: V | undefined, update: V) => V;
}

/** Schema: one channel per state field */
export type StateSchema<S> = { readonly [K in keyof S]-?: Channel<S[K]> };

/** Partial update produced by a node */
export type StateUpdate<S> = Partial<S>;

/**
 * Last writer wins.
 */
export function overwrite<V>(): Channel<V> {
    return {
        strategy: 'overwrite',
        reduce: (_current, update) => update,
    };
}

/**
 * Append-only sequence. An update carries the items to append.
 */
export function append<T>(): Channel<T[]> {
    return {
        strategy: 'append',
        reduce: (current, update) => [...(current ?? []), ...update],
    };
}

/**
 * Key-merged mapping. New keys are added, existing keys overwritten,
 * absent keys untouched.
 */
export function merge<V>(): Channel<Record<string, V>> {
    return {
        strategy: 'merge',
        reduce: (current, update) => ({ ...current, ...update }),
    };
}

/**
 * Apply one update to a state.
 * Fields absent from the update (or set to `undefined`) are copied unchanged.
 * @throws StateUpdateError for unknown fields and values the field strategy cannot take
 */
export function applyUpdate<S extends object>(
    schema: StateSchema<S>,
    state: S,
    update: StateUpdate<S> | undefined
): S {
    if (update === undefined) {
        return { ...state };
    }

    assertKnownFields(schema, update);

    const next: S = { ...state };
    for (const key of schemaKeys(schema)) {
        const value = update[key];
        if (value === undefined) {
            continue;
        }
        const { strategy } = schema[key];
        if (!fitsStrategy(strategy, value)) {
            throw new StateUpdateError(
                key,
                `Field "${key}" merges by ${strategy} and takes ${strategy === 'append' ? 'an array' : 'a plain object'}, got ${describeValue(value)}`,
            );
        }
        next[key] = schema[key].reduce(state[key], value);
    }

    return next;
}

/**
 * Apply updates one at a time in the given order.
 */
export function mergeUpdates<S extends object>(
    schema: StateSchema<S>,
    state: S,
    updates: ReadonlyArray<StateUpdate<S> | undefined>
): S {
    return updates.reduce<S>((acc, update) => applyUpdate(schema, acc, update), state);
}

/**
 * Field names of a schema, in declaration order.
 */
export function schemaKeys<S extends object>(schema: StateSchema<S>): Array<keyof S & string> {
    const keys: Array<keyof S & string> = [];
    for (const key of Object.keys(schema)) {
        if (isSchemaKey(schema, key)) {
            keys.push(key);
        }
    }
    return keys;
}

function isSchemaKey<S extends object>(schema: StateSchema<S>, key: string): key is keyof S & string {
    return Object.prototype.hasOwnProperty.call(schema, key);
}

/**
 * Strategy of every field, for build-time checks and diagnostics.
 */
export function describeSchema<S extends object>(schema: StateSchema<S>): Record<string, MergeStrategy> {
    const result: Record<string, MergeStrategy> = {};
    for (const key of schemaKeys(schema)) {
        result[key] = schema[key].strategy;
    }
    return result;
}

function assertKnownFields<S extends object>(schema: StateSchema<S>, value: Partial<S>): void {
    for (const key of Object.keys(value)) {
        if (!isSchemaKey(schema, key)) {
            throw new StateUpdateError(key, `Unknown state field "${key}"`);
        }
    }
}

/**
 * Structural check of a state read back from storage: no undeclared
 * fields, `append` fields hold arrays, `merge` fields hold objects.
 * Field values are otherwise trusted.
 */
export function isState<S extends object>(schema: StateSchema<S>, value: unknown): value is S {
    if (!isRecord(value)) {
        return false;
    }
    for (const key of Object.keys(value)) {
        if (!isSchemaKey(schema, key)) {
            return false;
        }
    }
    for (const key of schemaKeys(schema)) {
        const field = value[key];
        if (field === undefined) {
            continue;
        }
        if (!fitsStrategy(schema[key].strategy, field)) {
            return false;
        }
    }
    return true;
}

function fitsStrategy(strategy: MergeStrategy, value: unknown): boolean {
    switch (strategy) {
        case 'append':
            return Array.isArray(value);
        case 'merge':
            return isRecord(value);
        case 'overwrite':
            return true;
    }
}

function describeValue(value: unknown): string {
    if (value === null) {
        return 'null';
    }
    return Array.isArray(value) ? 'an array' : typeof value;
}
