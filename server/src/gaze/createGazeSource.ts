import { Psvr2ToolkitOptions, Psvr2ToolkitSource } from '../psvr2/psvr2ToolkitSource';
import { VrchatOscOptions, VrchatOscSource } from '../osc/vrchatOscSource';
import { emitSafely } from './baseSource';
import { monotonicClock } from './clock';
import { describeError, GazeSourceError } from './errors';
import { Clock, GazeEventSink, GazeSource, SourceResult, TrackerType } from './types';

export interface GazeSourceParams {
    clock?: Clock;
    events?: GazeEventSink;
    psvr2?: Partial<Psvr2ToolkitOptions>;
    osc?: Partial<VrchatOscOptions>;
}

function openVariant(variant: TrackerType, params: GazeSourceParams, clock: Clock, events: GazeEventSink): Promise<GazeSource> {
    switch (variant) {
        case 'psvr2-toolkit':
            return Psvr2ToolkitSource.open(params.psvr2, clock, events);
        case 'vrchat-osc':
            return VrchatOscSource.open(params.osc, clock, events);
    }
}

// reject 하지 않음: 연결할 수 없으면 ok: false
export async function createGazeSource(variant: TrackerType, params: GazeSourceParams = {}): Promise<SourceResult> {
    const clock = params.clock ?? monotonicClock;
    const events = params.events ?? (() => undefined);
    let source: GazeSource;
    try {
        source = await openVariant(variant, params, clock, events);
    } catch (err) {
        const reason = err instanceof GazeSourceError && err.kind === 'HandshakeFailed' ? 'HandshakeFailed' : 'ConnectionFailed';
        const message = describeError(err);
        emitSafely(events, { type: 'unavailable', tracker: variant, reason, detail: message });
        return { ok: false, reason, message };
    }
    emitSafely(events, { type: 'connected', tracker: variant });
    return { ok: true, source };
}

// 순서대로 시도해 처음 생성되는 소스, 없으면 null
export async function createFirstAvailableSource(
    variants: readonly TrackerType[],
    params: GazeSourceParams = {},
): Promise<GazeSource | null> {
    for (const variant of variants) {
        const result = await createGazeSource(variant, params);
        if (result.ok) {
            return result.source;
        }
    }
    return null;
}
