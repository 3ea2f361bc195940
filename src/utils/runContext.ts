import * as crypto from 'crypto';
import type { SourceName } from '../sources/types.js';

export interface RunContext {
    runId: string;
    startedAt: string;
    initialRun: boolean;
    sources: SourceName[];
}

export function createRunContext(sources: SourceName[], initialRun: boolean): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: new Date().toISOString(),
        initialRun,
        sources,
    };
}
