export interface WorkerExecutionError {
    leadId?: string;
    jobId?: string;
    message: string;
}

export interface WorkerExecutionResult {
    success: boolean;
    processedCount: number;
    skippedCount: number;
    errors: WorkerExecutionError[];
}

export function workerResult(
    processedCount: number,
    errors: WorkerExecutionError[] = [],
    skippedCount: number = 0
): WorkerExecutionResult {
    return {
        success: errors.length === 0,
        processedCount,
        skippedCount,
        errors,
    };
}
