/**
 * Dispatch Types
 */

export interface BackendSuccess {
    backend: string;
    status: 'success';
    transcript: string;
    elapsedMs: number;
    /** processing_time reported by the service itself, in seconds */
    serviceProcessingTime: number | null;
    modelInfo: Record<string, unknown>;
    diagnostics: Record<string, unknown>;
}

export interface BackendFailure {
    backend: string;
    status: 'error';
    errorMessage: string;
    elapsedMs: number;
}

export type BackendResult = BackendSuccess | BackendFailure;

export interface DispatchEnvelope {
    audioFilename: string;
    timestamp: string;
    requestedBackends: string[];
    healthyBackends: string[];
    results: Record<string, BackendResult>;
    successCount: number;
    totalElapsedMs: number;
    /** Present only when no requested backend passed the health gate */
    error?: string;
}

export interface DispatchRequest {
    payload: Blob;
    filename: string;
    backends?: readonly string[];
    includeDiagnostics?: boolean;
    signal?: AbortSignal;
}

export interface TimedPhoneme {
    phoneme: string;
    /** seconds */
    start: number;
    /** seconds */
    end: number;
}

export interface PhonemeTrack {
    backend: string;
    phonemes: string[];
    timedPhonemes: TimedPhoneme[];
}
