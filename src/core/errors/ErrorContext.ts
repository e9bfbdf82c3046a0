// src/core/errors/ErrorContext.ts

/**
 * Metadata provided with an error to help with debugging and caller decisions.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'TRANSPORT_ERROR')
    operation?: string;      // The function or process that failed
    suggestion?: string;     // Helpful tip for the operator
    component?: string;      // The layer where the error occurred
    retryable?: boolean;     // Whether a fresh connection may succeed
    details?: unknown;       // Original error or additional technical context
}
