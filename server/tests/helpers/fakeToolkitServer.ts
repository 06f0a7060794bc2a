import net from 'net';
import { GazeVector } from '../../src/gaze/types';
import {
    CommandType,
    decodeHandshakeRequest,
    encodeHandshakeResult,
    HandshakeResult,
    HEADER_SIZE,
    RawEyeSample,
    readHeader,
} from '../../src/psvr2/ipcProtocol';

export type HandshakeBehaviour = 'success' | 'refuse' | 'silent' | 'wrong-type' | 'wrong-length' | 'split';

export interface FakeToolkitOptions {
    handshake?: HandshakeBehaviour;
    // null 이면 해당 요청에 응답하지 않음
    respond?: (requestIndex: number) => Buffer | null;
}

export function eye(gazeDirNorm: GazeVector, isGazeDirValid = true): RawEyeSample {
    return {
        isGazeOriginValid: true,
        gazeOriginMm: { x: 30, y: 0, z: 0 },
        isGazeDirValid,
        gazeDirNorm,
        isPupilDiaValid: true,
        pupilDiaMm: 4,
        isBlinkValid: true,
        blink: false,
    };
}

// 툴킷 IPC 서버의 루프백 대역
export class FakeToolkitServer {
    readonly handshakes: { ipcVersion: number; processId: number }[] = [];
    gazeRequests = 0;
    private readonly sockets = new Set<net.Socket>();

    private constructor(
        private readonly server: net.Server,
        private readonly options: FakeToolkitOptions,
    ) {
        server.on('connection', (socket) => this.accept(socket));
    }

    static start(options: FakeToolkitOptions = {}): Promise<FakeToolkitServer> {
        const server = net.createServer();
        const fake = new FakeToolkitServer(server, options);
        return new Promise((resolve) => {
            server.listen(0, '127.0.0.1', () => resolve(fake));
        });
    }

    get port(): number {
        const info = this.server.address();
        if (!info || typeof info === 'string') {
            throw new Error('fake toolkit is not listening on tcp');
        }
        return info.port;
    }

    get connectionCount(): number {
        return this.sockets.size;
    }

    dropClients(): void {
        for (const socket of this.sockets) {
            socket.destroy();
        }
    }

    // 응답과 무관하게 모든 클라이언트에 원시 바이트 전송
    push(bytes: Buffer): void {
        for (const socket of this.sockets) {
            socket.write(bytes);
        }
    }

    close(): Promise<void> {
        this.dropClients();
        return new Promise((resolve) => this.server.close(() => resolve()));
    }

    private accept(socket: net.Socket): void {
        this.sockets.add(socket);
        socket.on('close', () => this.sockets.delete(socket));
        socket.on('error', () => socket.destroy());

        let pending: Buffer = Buffer.alloc(0);
        socket.on('data', (chunk: Buffer) => {
            pending = Buffer.concat([pending, chunk]);
            while (pending.length >= HEADER_SIZE) {
                const { type, dataLen } = readHeader(pending);
                const size = HEADER_SIZE + dataLen;
                if (pending.length < size) {
                    break;
                }
                const record = pending.subarray(0, size);
                pending = pending.subarray(size);
                this.handle(socket, type, record);
            }
        });
    }

    private handle(socket: net.Socket, type: number, record: Buffer): void {
        if (type === CommandType.ClientRequestHandshake) {
            this.handshakes.push(decodeHandshakeRequest(record));
            this.replyToHandshake(socket);
        } else if (type === CommandType.ClientRequestGazeData) {
            const index = this.gazeRequests++;
            const reply = this.options.respond?.(index) ?? null;
            if (reply) {
                socket.write(reply);
            }
        }
    }

    private replyToHandshake(socket: net.Socket): void {
        switch (this.options.handshake ?? 'success') {
            case 'success':
                socket.write(encodeHandshakeResult(HandshakeResult.Success));
                break;
            case 'refuse':
                socket.write(encodeHandshakeResult(HandshakeResult.Outdated));
                break;
            case 'silent':
                break;
            case 'wrong-type': {
                const reply = encodeHandshakeResult(HandshakeResult.Success);
                reply.writeUInt32LE(CommandType.ServerPong, 0);
                socket.write(reply);
                break;
            }
            case 'wrong-length': {
                const reply = encodeHandshakeResult(HandshakeResult.Success);
                reply.writeInt32LE(9, 4);
                socket.write(reply);
                break;
            }
            case 'split': {
                const reply = encodeHandshakeResult(HandshakeResult.Success);
                socket.write(reply.subarray(0, 5));
                setTimeout(() => {
                    if (!socket.destroyed) {
                        socket.write(reply.subarray(5));
                    }
                }, 30);
                break;
            }
        }
    }
}
