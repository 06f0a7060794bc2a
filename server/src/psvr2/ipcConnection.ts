import net from 'net';
import { setTimeout as sleep } from 'timers/promises';
import { ConnectionFailedError, describeError } from '../gaze/errors';

export interface RetryBudget {
    attempts: number;
    delayMs: number;
}

export interface ReceiveResult {
    data: Buffer | null;
    attemptsLeft: number;
}

function connectOnce(host: string, port: number): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
        const socket = net.connect({ host, port });
        const onError = (err: Error) => {
            socket.destroy();
            reject(err);
        };
        socket.once('error', onError);
        socket.once('connect', () => {
            socket.off('error', onError);
            resolve(socket);
        });
    });
}

// 툴킷과의 TCP 세션. 수신 바이트는 큐에 쌓았다가 receiveExact 로 레코드 단위로만 꺼낸다
export class IpcConnection {
    private chunks: Buffer[] = [];
    private buffered = 0;
    private closed = false;
    private lastError: string | null = null;

    private constructor(private readonly socket: net.Socket) {
        socket.setNoDelay(true);
        socket.on('data', (chunk: Buffer) => {
            this.chunks.push(chunk);
            this.buffered += chunk.length;
        });
        socket.on('error', (err: Error) => {
            this.lastError = err.message;
        });
        socket.on('close', () => {
            this.closed = true;
        });
    }

    static async connect(host: string, port: number, budget: RetryBudget): Promise<IpcConnection> {
        let lastError = 'no attempt made';
        for (let attempt = 1; attempt <= budget.attempts; attempt++) {
            try {
                return new IpcConnection(await connectOnce(host, port));
            } catch (err) {
                lastError = describeError(err);
            }
            if (attempt < budget.attempts) {
                await sleep(budget.delayMs);
            }
        }
        throw new ConnectionFailedError(
            `could not connect to ${host}:${port} after ${budget.attempts} attempts (${lastError})`,
        );
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get error(): string | null {
        return this.lastError;
    }

    get bufferedBytes(): number {
        return this.buffered;
    }

    send(record: Buffer): boolean {
        if (this.closed || this.socket.destroyed) {
            return false;
        }
        this.socket.write(record);
        return true;
    }

    // size 바이트가 쌓일 때까지 시도마다 확인. 예산 소진 시 data: null, 부분 바이트는 남겨둔다
    async receiveExact(size: number, budget: RetryBudget): Promise<ReceiveResult> {
        let attemptsLeft = budget.attempts;
        while (attemptsLeft > 0) {
            if (this.buffered >= size) {
                return { data: this.take(size), attemptsLeft };
            }
            if (this.closed) {
                break;
            }
            await sleep(budget.delayMs);
            attemptsLeft--;
        }
        return { data: null, attemptsLeft: 0 };
    }

    // 큐를 비워 다음 읽기가 새 레코드에서 시작하도록
    flush(): number {
        const dropped = this.buffered;
        this.chunks = [];
        this.buffered = 0;
        return dropped;
    }

    close(): Promise<void> {
        if (this.closed) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.socket.once('close', () => resolve());
            this.socket.destroy();
        });
    }

    private take(size: number): Buffer {
        const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
        const record = Buffer.from(all.subarray(0, size));
        const rest = all.subarray(size);
        this.chunks = rest.length > 0 ? [rest] : [];
        this.buffered = rest.length;
        return record;
    }
}
