import http from 'http';
import dotenv from 'dotenv';
import { Server as SocketIOServer } from 'socket.io';
import { SOCKET_EVENTS, SourcePayload } from '../../shared/socketEvents';
import { createApp } from './app';
import { ConfigError, loadConfig } from './config';
import { monotonicClock } from './gaze/clock';
import { createConsoleSink } from './gaze/consoleSink';
import { createFirstAvailableSource } from './gaze/createGazeSource';
import { GazeSource } from './gaze/types';
import { GazeRelay } from './relay';

dotenv.config(); // .env 파일을 로드함

async function main(): Promise<void> {
    const config = loadConfig();
    const clock = monotonicClock;
    let source: GazeSource | null = null;

    // express 앱과 http 서버 생성
    const app = createApp(() => source, clock, config.corsOrigin);
    const server = http.createServer(app);

    // socket.io 서버 생성
    const io = new SocketIOServer(server, {
        cors: {
            origin: config.corsOrigin,
            methods: ['GET', 'POST'],
        },
    });

    io.on('connection', (socket) => {
        console.log('✅ 새 클라이언트 연결:', socket.id);
        const payload: SourcePayload = { tracker: source?.getType() ?? null };
        socket.emit(SOCKET_EVENTS.GS_SOURCE, payload);
        socket.on('disconnect', () => {
            console.log(`❌ 연결 종료: ${socket.id}`);
        });
    });

    server.listen(config.port, () => {
        console.log(`🚀 서버 실행 중: http://localhost:${config.port}`);
    });

    // 설정된 순서대로 시선 소스 연결 시도
    source = await createFirstAvailableSource(config.sources, {
        clock,
        events: createConsoleSink({ verbose: config.verbose }),
    });
    if (!source) {
        console.warn(`⚠️ 사용 가능한 시선 소스 없음 (${config.sources.join(', ')})`);
    }

    const relay = source
        ? new GazeRelay(source, (event, data) => { io.emit(event, data); }, clock)
        : null;
    if (relay && source) {
        source.start(`relay-${process.pid}`);
        relay.start(config.relayHz);
    }

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        console.log(`👋 ${signal} 수신, 종료 중`);
        relay?.stop();
        if (source) {
            source.stop();
            await source.destroy();
        }
        io.close(() => process.exit(0));
    };
    process.on('SIGINT', () => { void shutdown('SIGINT'); });
    process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
}

main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
        console.error(`❌ ${err.message}`);
    } else {
        console.error('❌ 서버 시작 실패:', err);
    }
    process.exit(1);
});
