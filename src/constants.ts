export const VERSION = '__VERSION__ (__SYSTEM_INFO__)';
export const PROGRAM_NAME = 'concord';
export const DEFAULT_CONFIG_FILE = 'concord-config.yaml';

// Server
export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024; // 25MB

// Transcription backends
export const DEFAULT_HEALTH_TIMEOUT_MS = 5_000;
export const DEFAULT_BACKEND_TIMEOUT_MS = 120_000;
export const DEFAULT_ENDPOINT_PATH = '/transcribe';
export const HEALTH_PATH = '/health';

export const DEFAULT_BACKENDS: Record<string, { url: string; endpoint: string; timeoutMs: number }> = {
    whisper: { url: 'http://whisper-service:8001', endpoint: DEFAULT_ENDPOINT_PATH, timeoutMs: DEFAULT_BACKEND_TIMEOUT_MS },
    wav2vec: { url: 'http://wav2vec-service:8002', endpoint: DEFAULT_ENDPOINT_PATH, timeoutMs: DEFAULT_BACKEND_TIMEOUT_MS },
    moonshine: { url: 'http://moonshine-service:8003', endpoint: DEFAULT_ENDPOINT_PATH, timeoutMs: DEFAULT_BACKEND_TIMEOUT_MS },
    mesolitica: { url: 'http://mesolitica-service:8004', endpoint: DEFAULT_ENDPOINT_PATH, timeoutMs: DEFAULT_BACKEND_TIMEOUT_MS },
    vosk: { url: 'http://vosk-service:8005', endpoint: DEFAULT_ENDPOINT_PATH, timeoutMs: DEFAULT_BACKEND_TIMEOUT_MS },
    allosaurus: { url: 'http://allosaurus-service:8006', endpoint: DEFAULT_ENDPOINT_PATH, timeoutMs: DEFAULT_BACKEND_TIMEOUT_MS },
};

// Generation service
export const DEFAULT_GENERATION_MODEL = 'gpt-4o-mini';
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;
export const DEFAULT_GENERATION_TEMPERATURE = 0.3;

// Web search
export const DEFAULT_SEARCH_URL = 'https://api.tavily.com/search';
export const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;
export const DEFAULT_SEARCH_MAX_RESULTS = 3;
export const DEFAULT_SEARCH_TOP_RESULTS = 2;

// Pipeline
export const DEFAULT_CONTEXT = 'Speech recognition analysis';
export const DEFAULT_PHONEME_BACKEND = 'allosaurus';
export const DEFAULT_REGION = 'southeast_asian';
export const DEFAULT_MAX_SEARCH_QUERIES = 3;

// Particle timing policy
export const DEFAULT_MIN_GAP_MS = 50;
export const DEFAULT_MAX_SEGMENT_PHONEMES = 3;
export const DEFAULT_MAX_PHONEME_DISTANCE = 1;

export const NO_HEALTHY_BACKENDS = 'No healthy transcription backends available';
