import express from 'express';
import cors from 'cors';
import { Clock, GazeSource } from './gaze/types';

export interface HealthReport {
    ok: boolean;
    tracker: string | null;
    state: string | null;
    gazeAvailable: boolean;
}

export function healthOf(source: GazeSource | null, clock: Clock): HealthReport {
    if (!source) {
        return { ok: true, tracker: null, state: null, gazeAvailable: false };
    }
    return {
        ok: true,
        tracker: source.getType(),
        state: source.getState(),
        gazeAvailable: source.isGazeAvailable(clock.now()),
    };
}

export function createApp(getSource: () => GazeSource | null, clock: Clock, corsOrigin: string): express.Express {
    const app = express();
    app.use(cors({ origin: corsOrigin }));
    app.get('/health', (_req, res) => {
        res.json(healthOf(getSource(), clock));
    });
    return app;
}
