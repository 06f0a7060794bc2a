import { GazeEventSink, GazeSourceEvent } from './types';

function formatVector({ x, y, z }: { x: number; y: number; z: number }): string {
    return `(${x.toFixed(3)}, ${y.toFixed(3)}, ${z.toFixed(3)})`;
}

function log(event: GazeSourceEvent, verbose: boolean): void {
    switch (event.type) {
        case 'connected':
            console.log(`✅ [${event.tracker}] 연결됨`);
            break;
        case 'unavailable':
            console.warn(`⚠️ [${event.tracker}] 사용 불가 (${event.reason}): ${event.detail}`);
            break;
        case 'loop-started':
            console.log(`📡 [${event.tracker}] 수신 루프 시작`);
            break;
        case 'loop-stopped':
            console.log(`👋 [${event.tracker}] 수신 루프 종료`);
            break;
        case 'sample-published':
            if (verbose) {
                console.log(`👀 [${event.tracker}] gaze ${formatVector(event.vector)}`);
            }
            break;
        case 'sample-discarded':
            if (verbose) {
                console.log(`🚫 [${event.tracker}] 샘플 폐기 (${event.reason})`);
            }
            break;
        case 'malformed-message':
            console.warn(`⚠️ [${event.tracker}] 잘못된 메시지: ${event.detail}`);
            break;
        case 'transport-error':
            console.error(`❌ [${event.tracker}] 전송 오류: ${event.detail}`);
            break;
        case 'ignored-call':
            console.warn(`⚠️ [${event.tracker}] ${event.call}() 무시됨 (state: ${event.state})`);
            break;
    }
}

// 샘플 단위 이벤트는 verbose 일 때만 출력
export function createConsoleSink({ verbose = false }: { verbose?: boolean } = {}): GazeEventSink {
    return (event) => log(event, verbose);
}
