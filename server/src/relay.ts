import { GazePayload, SOCKET_EVENTS } from '../../shared/socketEvents';
import { toMilliseconds } from './gaze/clock';
import { Clock, GazeSource, GazeVector } from './gaze/types';

// io.emit 을 감싼 함수 (테스트에서는 jest.fn)
export type GazeBroadcast = (event: typeof SOCKET_EVENTS.GS_GAZE | typeof SOCKET_EVENTS.GS_LOST, payload?: GazePayload) => void;

// 활성 소스를 프레임 주기로 읽어 모든 클라이언트에 gaze 전달
export class GazeRelay {
    private timer: NodeJS.Timeout | null = null;
    private live = false;
    private readonly out: GazeVector = { x: 0, y: 0, z: 0 };

    constructor(
        private readonly source: GazeSource,
        private readonly broadcast: GazeBroadcast,
        private readonly clock: Clock,
    ) {}

    tick(): boolean {
        const now = this.clock.now();
        if (this.source.getGaze(now, this.out)) {
            this.live = true;
            this.broadcast(SOCKET_EVENTS.GS_GAZE, {
                gaze: [this.out.x, this.out.y, this.out.z],
                tracker: this.source.getType(),
                at: toMilliseconds(now),
            });
            return true;
        }
        if (this.live) {
            // 1초 이상 새 샘플 없음
            this.live = false;
            this.broadcast(SOCKET_EVENTS.GS_LOST);
        }
        return false;
    }

    start(hz: number): void {
        if (this.timer) {
            return;
        }
        this.timer = setInterval(() => this.tick(), Math.max(1, Math.round(1000 / hz)));
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }
}
