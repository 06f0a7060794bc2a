import { describeError } from './errors';
import { GazeCell } from './gazeSample';
import { hasNaN } from './vector';
import {
    BackendState,
    Clock,
    GazeEventSink,
    GazeSource,
    GazeSourceEvent,
    GazeVector,
    HostTime,
    SessionHandle,
    TrackerType,
} from './types';

// 싱크 예외는 수집 루프와 호스트로 전파하지 않는다
export function emitSafely(sink: GazeEventSink, event: GazeSourceEvent): void {
    try {
        sink(event);
    } catch (err) {
        console.error(`❌ [${event.tracker}] 이벤트 싱크 오류 (${event.type}):`, describeError(err));
    }
}

// 백엔드 공통: 상태 전이 connected → running → stopped, 최신 샘플, 수집 루프 태스크
export abstract class BaseGazeSource implements GazeSource {
    protected readonly cell = new GazeCell();
    private state: BackendState = 'connected';
    private task: Promise<void> | null = null;
    private destroyed: Promise<void> | null = null;

    protected constructor(
        private readonly tracker: TrackerType,
        protected readonly clock: Clock,
        private readonly events: GazeEventSink,
    ) {}

    protected abstract runLoop(): Promise<void>;

    // running 상태에서 stop 될 때 한 번 호출
    protected interrupt(): void {}

    protected abstract releaseTransport(): Promise<void>;

    start(_session: SessionHandle): void {
        if (this.state !== 'connected') {
            this.emit({ type: 'ignored-call', tracker: this.tracker, call: 'start', state: this.state });
            return;
        }
        this.state = 'running';
        this.emit({ type: 'loop-started', tracker: this.tracker });
        this.task = this.runLoop().then(
            () => this.emit({ type: 'loop-stopped', tracker: this.tracker }),
            (err: unknown) => {
                this.emit({ type: 'transport-error', tracker: this.tracker, detail: describeError(err) });
                this.emit({ type: 'loop-stopped', tracker: this.tracker });
            },
        );
    }

    stop(): void {
        if (this.state === 'stopped') {
            return;
        }
        const wasRunning = this.state === 'running';
        this.state = 'stopped';
        if (wasRunning) {
            this.interrupt();
        }
    }

    isGazeAvailable(time: HostTime): boolean {
        return this.cell.isFresh(time);
    }

    getGaze(time: HostTime, out: GazeVector): boolean {
        return this.cell.copyInto(time, out);
    }

    getType(): TrackerType {
        return this.tracker;
    }

    getState(): BackendState {
        return this.state;
    }

    destroy(): Promise<void> {
        if (!this.destroyed) {
            this.destroyed = this.teardown();
        }
        return this.destroyed;
    }

    protected isRunning(): boolean {
        return this.state === 'running';
    }

    protected emit(event: GazeSourceEvent): void {
        emitSafely(this.events, event);
    }

    protected publish(vector: GazeVector): boolean {
        if (hasNaN(vector)) {
            this.emit({ type: 'sample-discarded', tracker: this.tracker, reason: 'nan' });
            return false;
        }
        const at = this.clock.now();
        if (!this.cell.publish(vector, at)) {
            return false;
        }
        this.emit({ type: 'sample-published', tracker: this.tracker, vector, at });
        return true;
    }

    private async teardown(): Promise<void> {
        this.stop();
        if (this.task) {
            await this.task;
        }
        try {
            await this.releaseTransport();
        } catch (err) {
            this.emit({ type: 'transport-error', tracker: this.tracker, detail: describeError(err) });
        }
    }
}
