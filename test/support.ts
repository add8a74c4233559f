export type Op = 'put' | 'delete';

/**
 * Replays a deterministic pseudo-random sequence of map operations over the
 * integer keys `[0, keySpace)`. Puts outnumber deletes two to one.
 */
export function randomOps(
    count: number,
    keySpace: number,
    seed: number,
    apply: (op: Op, key: number, value: number) => void
): void {
    let state = seed >>> 0;
    const next = (): number => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state;
    };
    for (let i = 0; i < count; i++) {
        const op: Op = next() % 3 === 0 ? 'delete' : 'put';
        apply(op, next() % keySpace, i);
    }
}
