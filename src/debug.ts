import type { NavMeshPath, NavMeshSystem, SearchNodePool } from './query';
import { AreaFlags, getSearchNode } from './query';

// debug primitive types
export enum DebugPrimitiveType {
    Lines = 0,
    Points = 1,
}

export type DebugLines = {
    type: DebugPrimitiveType.Lines;
    positions: number[]; // x,y,z for each line endpoint
    colors: number[]; // r,g,b for each line endpoint
    lineWidth?: number;
    transparent?: boolean;
    opacity?: number;
};

export type DebugPoints = {
    type: DebugPrimitiveType.Points;
    positions: number[]; // x,y,z for each point
    colors: number[]; // r,g,b for each point
    size: number;
    transparent?: boolean;
    opacity?: number;
};

export type DebugPrimitive = DebugLines | DebugPoints;

// Utility functions
function hslToRgb(h: number, s: number, l: number): [number, number, number] {
    h /= 360;
    const a = s * Math.min(l, 1 - l);
    const f = (n: number) => {
        const k = (n + h * 12) % 12;
        return l - a * Math.max(Math.min(k - 3, 9 - k, 1), -1);
    };
    return [f(0), f(8), f(4)];
}

export function areaToColor(area: number): [number, number, number] {
    if (area === AreaFlags.WALKABLE) {
        return [0, 192 / 255, 1];
    }
    if (area === 0) {
        return [0, 0, 0];
    }
    const hash = area * 137.5;
    const hue = hash % 360;
    return hslToRgb(hue, 0.7, 0.6);
}

/**
 * Polygon outlines colored by area, polygon centers, and adjacency links between centers.
 */
export function createNavMeshHelper(system: NavMeshSystem): DebugPrimitive[] {
    const primitives: DebugPrimitive[] = [];

    const outlinePositions: number[] = [];
    const outlineColors: number[] = [];
    const centerPositions: number[] = [];
    const centerColors: number[] = [];
    const linkPositions: number[] = [];
    const linkColors: number[] = [];

    const linkColor = [1.0, 1.0, 1.0];

    for (const polyId of system.polyIdOrder) {
        const poly = system.polys.get(polyId);
        if (!poly) continue;

        const color = areaToColor(poly.area);
        const nv = poly.vertices.length;

        for (let i = 0; i < nv; i++) {
            const va = poly.vertices[i];
            const vb = poly.vertices[(i + 1) % nv];
            outlinePositions.push(va[0], va[1], va[2], vb[0], vb[1], vb[2]);
            outlineColors.push(color[0], color[1], color[2], color[0], color[1], color[2]);
        }

        centerPositions.push(poly.center[0], poly.center[1], poly.center[2]);
        centerColors.push(color[0], color[1], color[2]);

        for (const neighborId of poly.neighbors) {
            // draw each link once
            if (neighborId < poly.id && system.polys.get(neighborId)?.neighbors.includes(poly.id)) continue;

            const neighbor = system.polys.get(neighborId);
            if (!neighbor) continue;

            linkPositions.push(poly.center[0], poly.center[1], poly.center[2], neighbor.center[0], neighbor.center[1], neighbor.center[2]);
            linkColors.push(linkColor[0], linkColor[1], linkColor[2], linkColor[0], linkColor[1], linkColor[2]);
        }
    }

    if (outlinePositions.length > 0) {
        primitives.push({
            type: DebugPrimitiveType.Lines,
            positions: outlinePositions,
            colors: outlineColors,
            lineWidth: 1.5,
            transparent: false,
            opacity: 1.0,
        });
    }

    if (centerPositions.length > 0) {
        primitives.push({
            type: DebugPrimitiveType.Points,
            positions: centerPositions,
            colors: centerColors,
            size: 0.05,
            transparent: false,
            opacity: 1.0,
        });
    }

    if (linkPositions.length > 0) {
        primitives.push({
            type: DebugPrimitiveType.Lines,
            positions: linkPositions,
            colors: linkColors,
            lineWidth: 1.0,
            transparent: true,
            opacity: 0.5,
        });
    }

    return primitives;
}

export function createSearchNodesHelper(nodePool: SearchNodePool): DebugPrimitive[] {
    const primitives: DebugPrimitive[] = [];

    if (nodePool.allocatedCount === 0) {
        return primitives;
    }

    const yOffset = 0.5;
    const pointPositions: number[] = [];
    const pointColors: number[] = [];
    const linePositions: number[] = [];
    const lineColors: number[] = [];

    // Color (255,192,0) -> (1, 0.7529, 0)
    const pointColor = [1.0, 192 / 255, 0.0];
    const lineColor = [1.0, 192 / 255, 0.0];

    for (const node of nodePool.nodes) {
        if (!node.allocated) continue;

        const [x, y, z] = node.position;
        pointPositions.push(x, y + yOffset, z);
        pointColors.push(pointColor[0], pointColor[1], pointColor[2]);

        // Lines to parents
        if (node.parent === null) continue;

        const parent = getSearchNode(nodePool, node.parent);
        if (!parent) continue;

        const [px, py, pz] = parent.position;
        linePositions.push(x, y + yOffset, z, px, py + yOffset, pz);
        lineColors.push(lineColor[0], lineColor[1], lineColor[2], lineColor[0], lineColor[1], lineColor[2]);
    }

    primitives.push({
        type: DebugPrimitiveType.Points,
        positions: pointPositions,
        colors: pointColors,
        size: 0.01,
        transparent: true,
        opacity: 1.0,
    });

    if (linePositions.length > 0) {
        primitives.push({
            type: DebugPrimitiveType.Lines,
            positions: linePositions,
            colors: lineColors,
            transparent: true,
            opacity: 0.5,
            lineWidth: 2.0,
        });
    }

    return primitives;
}

export function createNavMeshPathHelper(path: NavMeshPath): DebugPrimitive[] {
    if (path.waypoints.length < 2) {
        return [];
    }

    const positions: number[] = [];
    const colors: number[] = [];

    for (let i = 0; i < path.waypoints.length - 1; i++) {
        const a = path.waypoints[i].position;
        const b = path.waypoints[i + 1].position;
        positions.push(a[0], a[1], a[2], b[0], b[1], b[2]);
        colors.push(0, 1, 0, 0, 1, 0);
    }

    return [
        {
            type: DebugPrimitiveType.Lines,
            positions,
            colors,
            lineWidth: 3.0,
            transparent: false,
            opacity: 1.0,
        },
    ];
}

/**
 * The nav mesh and the last search's nodes, if drawing is enabled.
 */
export function getNavMeshDebugPrimitives(system: NavMeshSystem): DebugPrimitive[] {
    if (!system.drawNavMesh) {
        return [];
    }

    return [...createNavMeshHelper(system), ...createSearchNodesHelper(system.nodePool)];
}
