import { setTimeout as sleep } from 'timers/promises';
import { BaseGazeSource } from '../gaze/baseSource';
import { monotonicClock } from '../gaze/clock';
import { describeError, HandshakeFailedError } from '../gaze/errors';
import { toolkitToViewSpace } from '../gaze/vector';
import { Clock, GazeEventSink } from '../gaze/types';
import { IpcConnection, RetryBudget } from './ipcConnection';
import {
    CommandType,
    decodeGazeDataResult,
    decodeHandshakeResult,
    encodeGazeDataRequest,
    encodeHandshakeRequest,
    GAZE_RESPONSE_BYTES,
    GazeDataResponse,
    HANDSHAKE_RESPONSE_BYTES,
    HandshakeResponse,
    HandshakeResult,
    IPC_SERVER_PORT,
    IPC_VERSION,
} from './ipcProtocol';

export interface Psvr2ToolkitOptions {
    host: string;
    port: number;
    processId: number;
    connect: RetryBudget;
    handshake: RetryBudget;
    read: RetryBudget;
    pollIntervalMs: number; // 요청 사이 대기 상한
}

export const DEFAULT_PSVR2_OPTIONS: Psvr2ToolkitOptions = {
    host: '127.0.0.1',
    port: IPC_SERVER_PORT,
    processId: process.pid,
    connect: { attempts: 15, delayMs: 100 },
    handshake: { attempts: 5, delayMs: 100 },
    read: { attempts: 5, delayMs: 1 },
    pollIntervalMs: 5,
};

// 직전 응답이 읽기 예산을 많이 쓸수록 대기 시간이 줄어든다
export function pacingDelayMs(attemptsLeft: number, budget: number, pollIntervalMs: number): number {
    if (budget <= 0) {
        return pollIntervalMs;
    }
    return (pollIntervalMs * Math.max(0, Math.min(attemptsLeft, budget))) / budget;
}

async function handshake(connection: IpcConnection, options: Psvr2ToolkitOptions): Promise<void> {
    connection.send(encodeHandshakeRequest(options.processId));

    const { data } = await connection.receiveExact(HANDSHAKE_RESPONSE_BYTES, options.handshake);
    if (!data) {
        throw new HandshakeFailedError(
            `no handshake result within ${options.handshake.attempts} attempts ` +
                `(${connection.bufferedBytes} of ${HANDSHAKE_RESPONSE_BYTES} bytes)`,
        );
    }
    let response: HandshakeResponse;
    try {
        response = decodeHandshakeResult(data);
    } catch (err) {
        throw new HandshakeFailedError(`unreadable handshake result: ${describeError(err)}`);
    }
    if (response.header.type !== CommandType.ServerHandshakeResult) {
        throw new HandshakeFailedError(`unexpected command ${response.header.type} in handshake`);
    }
    if (response.result !== HandshakeResult.Success) {
        throw new HandshakeFailedError(
            `toolkit refused handshake (result ${response.result}, server ipc v${response.ipcVersion}, ours v${IPC_VERSION})`,
        );
    }
}

export class Psvr2ToolkitSource extends BaseGazeSource {
    private constructor(
        private readonly connection: IpcConnection,
        private readonly options: Psvr2ToolkitOptions,
        clock: Clock,
        events: GazeEventSink,
    ) {
        super('psvr2-toolkit', clock, events);
    }

    // ConnectionFailedError 또는 HandshakeFailedError 로 reject
    static async open(
        overrides: Partial<Psvr2ToolkitOptions> = {},
        clock: Clock = monotonicClock,
        events: GazeEventSink = () => undefined,
    ): Promise<Psvr2ToolkitSource> {
        const options = { ...DEFAULT_PSVR2_OPTIONS, ...overrides };
        const connection = await IpcConnection.connect(options.host, options.port, options.connect);
        try {
            await handshake(connection, options);
        } catch (err) {
            await connection.close();
            throw err;
        }
        return new Psvr2ToolkitSource(connection, options, clock, events);
    }

    protected async runLoop(): Promise<void> {
        const { read, pollIntervalMs } = this.options;
        while (this.isRunning()) {
            if (!this.connection.send(encodeGazeDataRequest())) {
                this.emit({
                    type: 'transport-error',
                    tracker: this.getType(),
                    detail: `toolkit connection closed${this.connection.error ? ` (${this.connection.error})` : ''}`,
                });
                return;
            }

            const { data, attemptsLeft } = await this.connection.receiveExact(GAZE_RESPONSE_BYTES, read);
            if (data) {
                this.handleGazeResponse(data);
            } else {
                const dropped = this.connection.flush();
                this.emit({
                    type: 'malformed-message',
                    tracker: this.getType(),
                    detail: `gaze response incomplete after ${read.attempts} attempts (${dropped} bytes dropped)`,
                });
            }

            await sleep(pacingDelayMs(attemptsLeft, read.attempts, pollIntervalMs));
        }
    }

    protected releaseTransport(): Promise<void> {
        return this.connection.close();
    }

    private handleGazeResponse(data: Buffer): void {
        let response: GazeDataResponse;
        try {
            response = decodeGazeDataResult(data);
        } catch (err) {
            this.connection.flush();
            this.emit({ type: 'malformed-message', tracker: this.getType(), detail: describeError(err) });
            return;
        }

        const { leftEye, rightEye } = response;
        if (!leftEye.isGazeDirValid || !rightEye.isGazeDirValid) {
            this.emit({ type: 'sample-discarded', tracker: this.getType(), reason: 'invalid-eye' });
            return;
        }
        this.publish(toolkitToViewSpace(leftEye.gazeDirNorm, rightEye.gazeDirNorm));
    }
}
