/**
 * Sequence Resolver
 *
 * Turns a Protocol's method into an executable sequence: tags are removed,
 * every remaining step gets a position, and each loop's start_step label is
 * rewritten to the position it jumps back to.
 *
 * Also provides the loop-structure helpers shared by exporters:
 * groupIterations (nested task / iteration tree) and unrollPositions
 * (execution order with loops expanded).
 */

import { MAX_UNROLLED_STEPS } from './config';
import { LoopStep, Protocol, Step, TagStep } from './protocol_model';
import { EncodingError, StructuralError, UnresolvedReferenceError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

/** Steps that do work on the cell (everything except tags and loops). */
export type TaskStep = Exclude<Step, TagStep | LoopStep>;

export interface ResolvedTask<T = TaskStep> {
    readonly kind: 'task';
    /** Index in the protocol method (tags included). */
    readonly index: number;
    /** Zero-based position among executable steps. */
    readonly position: number;
    readonly step: T;
}

export interface ResolvedLoop {
    readonly kind: 'loop';
    readonly index: number;
    readonly position: number;
    readonly step: LoopStep;
    /** Method index of the Tag named by start_step. */
    readonly target_index: number;
    /** Position of the first executable step after the target Tag. */
    readonly goto: number;
}

export type ResolvedStep<T = TaskStep> = ResolvedTask<T> | ResolvedLoop;

export interface Sequence<T = TaskStep> {
    readonly protocol: Protocol;
    /** Executable steps, indexed by position. */
    readonly steps: readonly ResolvedStep<T>[];
    readonly labels: ReadonlyMap<string, number>;
}

export type ResolvedSequence = Sequence<TaskStep>;

/* -------------------------------------------------------------------------- */
/* Resolution                                                                 */
/* -------------------------------------------------------------------------- */

export function resolve(protocol: Protocol): ResolvedSequence {
    // Pass 1: label -> method index, label -> goto position
    const labels = new Map<string, number>();
    const gotoByLabel = new Map<string, number>();
    let executed = 0;
    protocol.method.forEach((step, index) => {
        if (step.step === 'tag') {
            if (labels.has(step.tag)) {
                throw StructuralError.single(
                    'DUPLICATE_TAG',
                    `Duplicate tag '${step.tag}' at step ${index}`,
                    `method[${index}].tag`,
                    index
                );
            }
            labels.set(step.tag, index);
            gotoByLabel.set(step.tag, executed);
        } else {
            executed++;
        }
    });

    // Pass 2: positions and loop targets
    const steps: ResolvedStep[] = [];
    protocol.method.forEach((step, index) => {
        if (step.step === 'tag') return;
        const position = steps.length;
        if (step.step !== 'loop') {
            steps.push({ kind: 'task', index, position, step });
            return;
        }

        const target_index = labels.get(step.start_step);
        const goto = gotoByLabel.get(step.start_step);
        if (target_index === undefined || goto === undefined) {
            throw new UnresolvedReferenceError(
                `Loop at step ${index} refers to tag '${step.start_step}', which does not exist`,
                'MISSING_TAG',
                index,
                { start_step: step.start_step }
            );
        }
        if (target_index >= index) {
            throw new UnresolvedReferenceError(
                `Loop at step ${index} refers to tag '${step.start_step}' at step ${target_index}; loops can only go backwards`,
                'FORWARD_LOOP',
                index,
                { start_step: step.start_step, target_index }
            );
        }
        if (goto >= position) {
            throw new UnresolvedReferenceError(
                `Loop at step ${index} has no steps between tag '${step.start_step}' and the loop`,
                'EMPTY_LOOP_BODY',
                index,
                { start_step: step.start_step, target_index }
            );
        }
        steps.push({ kind: 'loop', index, position, step, target_index, goto });
    });

    if (steps.length === 0) {
        throw StructuralError.single('EMPTY_METHOD', 'Method has no executable steps', 'method');
    }
    checkForIntersectingLoops(steps);

    return { protocol, steps, labels };
}

/**
 * Loops must either nest completely or not overlap at all.
 * A loop spans positions [goto, position].
 */
export function checkForIntersectingLoops<T>(steps: readonly ResolvedStep<T>[]): void {
    const spans = steps
        .filter((s): s is ResolvedLoop => s.kind === 'loop')
        .map(s => ({ start: s.goto, end: s.position, index: s.index }))
        .sort((a, b) => a.start - b.start || a.end - b.end);

    for (let i = 0; i < spans.length; i++) {
        for (let j = i + 1; j < spans.length; j++) {
            const a = spans[i];
            const b = spans[j];
            if (b.start > a.end) break;
            if ((a.start < b.start && a.end < b.end) || (a.start > b.start && a.end > b.end)) {
                const later = Math.max(a.index, b.index);
                throw StructuralError.single(
                    'INTERSECTING_LOOPS',
                    `Loops at steps ${Math.min(a.index, b.index)} and ${later} intersect`,
                    `method[${later}]`,
                    later
                );
            }
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Loop structure                                                             */
/* -------------------------------------------------------------------------- */

export type IterationNode<T = TaskStep> =
    | { readonly kind: 'task'; readonly task: ResolvedTask<T> }
    | { readonly kind: 'iteration'; readonly loop: ResolvedLoop; readonly children: readonly IterationNode<T>[] };

/**
 * Groups executable steps into a tree: plain tasks, and iteration blocks that
 * hold the body of a loop. Walks backwards so an outer loop swallows its
 * nested loops whole.
 */
export function groupIterations<T>(sequence: Sequence<T>): IterationNode<T>[] {
    return groupRange(sequence.steps, 0, sequence.steps.length);
}

function groupRange<T>(steps: readonly ResolvedStep<T>[], from: number, to: number): IterationNode<T>[] {
    const nodes: IterationNode<T>[] = [];
    let p = to - 1;
    while (p >= from) {
        const step = steps[p];
        if (step.kind === 'loop') {
            nodes.push({ kind: 'iteration', loop: step, children: groupRange(steps, step.goto, p) });
            p = step.goto - 1;
        } else {
            nodes.push({ kind: 'task', task: step });
            p--;
        }
    }
    return nodes.reverse();
}

export interface UnrollOptions {
    /** Upper bound on cycles per loop (e.g. 2 to visit every wrap-around once). */
    cycleCap?: number;
    /** Upper bound on visited steps, loops included. */
    maxSteps?: number;
}

/**
 * Execution order of task positions with every loop expanded. A loop with
 * cycle_count n jumps back n - 1 times; when an outer loop jumps over an inner
 * loop, the inner loop's count starts again.
 */
export function unrollPositions<T>(sequence: Sequence<T>, options: UnrollOptions = {}): number[] {
    const maxSteps = options.maxSteps ?? MAX_UNROLLED_STEPS;
    const { steps } = sequence;
    const done = new Map<number, number>();
    const order: number[] = [];

    let visited = 0;
    let p = 0;
    while (p < steps.length) {
        const step = steps[p];
        if (++visited > maxSteps) {
            throw new EncodingError(
                `Unrolling loops exceeds ${maxSteps} steps`,
                'TOO_MANY_STEPS',
                step.index,
                { max_steps: maxSteps }
            );
        }

        if (step.kind === 'task') {
            order.push(p);
            p++;
            continue;
        }

        const cycles = options.cycleCap === undefined
            ? step.step.cycle_count
            : Math.min(step.step.cycle_count, options.cycleCap);
        const jumps = done.get(p) ?? 0;
        if (jumps < cycles - 1) {
            for (const inner of done.keys()) {
                if (inner >= step.goto && inner < p) done.set(inner, 0);
            }
            done.set(p, jumps + 1);
            p = step.goto;
        } else {
            p++;
        }
    }
    return order;
}
