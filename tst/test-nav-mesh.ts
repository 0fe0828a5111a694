import pino from 'pino';
import type { NavMeshPolyParams, NavMeshSource } from '../src';

export const silentLogger = pino({ level: 'silent' });

/**
 * A row of polygons along +x, `spacing` apart, each linked to its neighbours.
 * Ids start at 1.
 */
export const createLineSource = (count: number, spacing = 5): NavMeshSource => {
    const polys: NavMeshPolyParams[] = [];

    for (let i = 0; i < count; i++) {
        const id = i + 1;
        const neighbors: number[] = [];
        if (i > 0) neighbors.push(id - 1);
        if (i < count - 1) neighbors.push(id + 1);

        polys.push({ id, center: [i * spacing, 0, 0], neighbors });
    }

    return { name: 'line', polys };
};

/** Axis aligned square in the XZ plane */
export const square = (cx: number, cz: number, halfSize: number, y = 0): NavMeshPolyParams['vertices'] => [
    [cx - halfSize, y, cz - halfSize],
    [cx + halfSize, y, cz - halfSize],
    [cx + halfSize, y, cz + halfSize],
    [cx - halfSize, y, cz + halfSize],
];
