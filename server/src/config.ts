import { z } from 'zod';
import { TRACKER_TYPES, TrackerType } from './gaze/types';

const trackerList = z
    .string()
    .transform((raw) => raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
    .pipe(z.array(z.enum(TRACKER_TYPES)).min(1, 'at least one gaze source is required'));

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    CORS_ORIGIN: z.string().min(1).default('*'),
    GAZE_SOURCES: trackerList.default('psvr2-toolkit,vrchat-osc'),
    GAZE_RELAY_HZ: z.coerce.number().min(1).max(1000).default(90),
    GAZE_VERBOSE: booleanFlag.default('false'),
});

export interface RelayConfig {
    port: number;
    corsOrigin: string;
    sources: TrackerType[];
    relayHz: number;
    verbose: boolean;
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    }
    const { PORT, CORS_ORIGIN, GAZE_SOURCES, GAZE_RELAY_HZ, GAZE_VERBOSE } = parsed.data;
    return {
        port: PORT,
        corsOrigin: CORS_ORIGIN,
        sources: GAZE_SOURCES,
        relayHz: GAZE_RELAY_HZ,
        verbose: GAZE_VERBOSE,
    };
}
