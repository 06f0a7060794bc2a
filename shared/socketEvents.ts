export const SOCKET_EVENTS = {
    GS_SOURCE: 'gs:source',
    GS_GAZE: 'gs:gaze',
    GS_LOST: 'gs:lost',
} as const;

export type SocketEvent = typeof SOCKET_EVENTS[keyof typeof SOCKET_EVENTS];

export interface GazePayload {
    gaze: [number, number, number];
    tracker: string;
    at: number; // ms, host clock
}

export interface SourcePayload {
    tracker: string | null;
}
