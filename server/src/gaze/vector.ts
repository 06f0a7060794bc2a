import { GazeVector } from './types';

export interface EyePitchYaw {
    pitch: number; // 도
    yaw: number; // 도
}

const DEG_TO_RAD = Math.PI / 180;

export function hasNaN(vector: GazeVector): boolean {
    return Number.isNaN(vector.x) || Number.isNaN(vector.y) || Number.isNaN(vector.z);
}

export function averageEyes(left: GazeVector, right: GazeVector): GazeVector {
    return {
        x: (left.x + right.x) / 2,
        y: (left.y + right.y) / 2,
        z: (left.z + right.z) / 2,
    };
}

// 툴킷 방향은 뷰 공간 기준 X, Z 가 반전
export function toolkitToViewSpace(left: GazeVector, right: GazeVector): GazeVector {
    const mean = averageEyes(left, right);
    return { x: -mean.x, y: mean.y, z: -mean.z };
}

// 각도(도) → 한쪽 눈 방향, pitch 양수면 아래
export function eyeDirection({ pitch, yaw }: EyePitchYaw): GazeVector {
    const pitchRad = -pitch * DEG_TO_RAD;
    const yawRad = yaw * DEG_TO_RAD;
    return {
        x: Math.sin(yawRad) * Math.cos(pitchRad),
        y: Math.sin(pitchRad),
        z: -Math.cos(yawRad) * Math.cos(pitchRad),
    };
}

export function pitchYawToViewSpace(left: EyePitchYaw, right: EyePitchYaw): GazeVector {
    return averageEyes(eyeDirection(left), eyeDirection(right));
}
