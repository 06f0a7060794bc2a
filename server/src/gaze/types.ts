export interface GazeVector {
    x: number;
    y: number;
    z: number;
}

// 단조 증가 나노초 (XR 런타임 시간과 같은 단위)
export type HostTime = bigint;

export interface Clock {
    now(): HostTime;
}

// 이 계층에서는 불투명, 호스트가 세션 식별값을 넘긴다
export type SessionHandle = unknown;

export const TRACKER_TYPES = ['psvr2-toolkit', 'vrchat-osc'] as const;
export type TrackerType = typeof TRACKER_TYPES[number];

export type BackendState = 'constructing' | 'connected' | 'running' | 'stopped';

export type GazeErrorKind = 'ConnectionFailed' | 'HandshakeFailed' | 'MalformedMessage' | 'StaleData';

export type UnavailableReason = Extract<GazeErrorKind, 'ConnectionFailed' | 'HandshakeFailed'>;

export type GazeSourceEvent =
    | { type: 'connected'; tracker: TrackerType }
    | { type: 'unavailable'; tracker: TrackerType; reason: UnavailableReason; detail: string }
    | { type: 'loop-started'; tracker: TrackerType }
    | { type: 'loop-stopped'; tracker: TrackerType }
    | { type: 'sample-published'; tracker: TrackerType; vector: GazeVector; at: HostTime }
    | { type: 'sample-discarded'; tracker: TrackerType; reason: 'invalid-eye' | 'nan' }
    | { type: 'malformed-message'; tracker: TrackerType; detail: string }
    | { type: 'transport-error'; tracker: TrackerType; detail: string }
    | { type: 'ignored-call'; tracker: TrackerType; call: 'start'; state: BackendState };

export type GazeEventSink = (event: GazeSourceEvent) => void;

export interface GazeSource {
    start(session: SessionHandle): void;
    stop(): void;
    isGazeAvailable(time: HostTime): boolean;
    getGaze(time: HostTime, out: GazeVector): boolean;
    getType(): TrackerType;
    getState(): BackendState;
    destroy(): Promise<void>;
}

export type SourceResult =
    | { ok: true; source: GazeSource }
    | { ok: false; reason: UnavailableReason; message: string };
