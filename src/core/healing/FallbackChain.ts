// src/core/healing/FallbackChain.ts

import { AllCandidatesFailedError, CandidateFailure, errorMessage } from '../errors/AutomationErrors';

export interface LabeledCandidate<T> {
    label: string;
    run: () => Promise<T>;
}

export type Candidate<T> = LabeledCandidate<T> | (() => Promise<T>);

export interface ChainResult<T> {
    value: T;
    /** Position of the winning candidate. */
    index: number;
    label: string;
}

function normalize<T>(candidate: Candidate<T>, index: number): LabeledCandidate<T> {
    return typeof candidate === 'function'
        ? { label: `candidate ${index + 1}`, run: candidate }
        : candidate;
}

/**
 * Runs candidates strictly in order and stops at the first that resolves.
 * When every candidate rejects, the error lists each label with its failure.
 */
export async function tryInOrderWithResult<T>(
    candidates: ReadonlyArray<Candidate<T>>,
    subject: string = 'operation'
): Promise<ChainResult<T>> {
    const failures: CandidateFailure[] = [];

    for (let index = 0; index < candidates.length; index++) {
        const candidate = candidates[index];
        if (candidate === undefined) continue;
        const { label, run } = normalize(candidate, index);
        try {
            const value = await run();
            return { value, index, label };
        } catch (error) {
            failures.push({ label, message: errorMessage(error) });
        }
    }

    throw new AllCandidatesFailedError(failures, subject);
}

export async function tryInOrder<T>(candidates: ReadonlyArray<Candidate<T>>, subject?: string): Promise<T> {
    const result = await tryInOrderWithResult(candidates, subject);
    return result.value;
}
