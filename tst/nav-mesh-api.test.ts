import pino from 'pino';
import { describe, expect, test } from 'vitest';
import type { Vec3 } from 'mathcat';
import {
    AreaFlags,
    addTrigger,
    createNavMeshPath,
    createNavMeshPoly,
    createNavMeshSystem,
    drawNavMesh,
    findPath,
    findPolygon,
    getNavMeshController,
    getPolygon,
    isPositionInPolygon,
    loadNavMesh,
    type NavMeshTrigger,
    NULL_POLY_ID,
    PathFindResult,
    removeTrigger,
    setNavMeshParams,
    terminateNavMeshSystem,
    unloadNavMesh,
    updateTriggers,
} from '../src';
import { createLineSource, silentLogger, square } from './test-nav-mesh';

describe('nav-mesh-api', () => {
    describe('createNavMeshPoly', () => {
        test('derives center and height from the vertices', () => {
            const poly = createNavMeshPoly({
                id: 1,
                vertices: [
                    [0, 2, 0],
                    [4, 2, 0],
                    [4, 2, 4],
                    [0, 2, 4],
                ],
            });

            expect(poly.center).toEqual([2, 2, 2]);
            expect(poly.height).toBe(2);
            expect(poly.area).toBe(AreaFlags.WALKABLE);
            expect(poly.flags).toBe(0);
            expect(poly.neighbors).toEqual([]);
        });

        test('keeps explicit center, height and area', () => {
            const poly = createNavMeshPoly({
                id: 3,
                center: [1, 2, 3],
                height: 5,
                area: AreaFlags.WATER,
                flags: 9,
                neighbors: [4],
            });

            expect(poly.center).toEqual([1, 2, 3]);
            expect(poly.height).toBe(5);
            expect(poly.area).toBe(AreaFlags.WATER);
            expect(poly.flags).toBe(9);
            expect(poly.neighbors).toEqual([4]);
        });

        test('copies its inputs', () => {
            const center: Vec3 = [1, 0, 1];
            const neighbors = [2];
            const poly = createNavMeshPoly({ id: 1, center, neighbors });

            center[0] = 100;
            neighbors.push(3);

            expect(poly.center).toEqual([1, 0, 1]);
            expect(poly.neighbors).toEqual([2]);
        });
    });

    describe('loadNavMesh', () => {
        test('first loaded world becomes active', () => {
            const system = createNavMeshSystem({ logger: silentLogger });

            expect(getNavMeshController(system)).toBeNull();

            expect(loadNavMesh(system, createLineSource(2), 1)).toBe(true);
            expect(loadNavMesh(system, { polys: [{ id: 10, center: [50, 0, 0] }] }, 2)).toBe(true);

            expect(getNavMeshController(system)?.worldId).toBe(1);
            expect(getNavMeshController(system)?.name).toBe('line');
            expect(system.controllers.get(2)?.name).toBe('world-2');
            expect(getPolygon(system, 1)?.center).toEqual([0, 0, 0]);
            expect(getPolygon(system, 10)?.center).toEqual([50, 0, 0]);
        });

        test('reloading a world replaces its controller and polygons', () => {
            const system = createNavMeshSystem({ logger: silentLogger });

            loadNavMesh(system, createLineSource(2), 0);
            const previous = getNavMeshController(system);

            loadNavMesh(system, { polys: [{ id: 3, center: [0, 0, 0] }] }, 0);

            expect(getPolygon(system, 1)).toBeUndefined();
            expect(getPolygon(system, 2)).toBeUndefined();
            expect(getPolygon(system, 3)).toBeDefined();
            expect(system.controllers.size).toBe(1);
            expect(getNavMeshController(system)).not.toBe(previous);
            expect(getNavMeshController(system)?.polyIds).toEqual(new Set([3]));
        });

        test('skips polygons with the reserved id and logs a warning', () => {
            const lines: string[] = [];
            const logger = pino({ level: 'warn' }, { write: (msg: string) => lines.push(msg) });
            const system = createNavMeshSystem({ logger });

            loadNavMesh(system, {
                polys: [
                    { id: 0, center: [0, 0, 0] },
                    { id: 1, center: [5, 0, 0] },
                ],
            });

            expect(system.polys.size).toBe(1);
            expect(lines.length).toBe(1);

            const entry = JSON.parse(lines[0]);
            expect(entry.level).toBe(40);
            expect(entry.msg).toBe('skipping polygon with reserved id 0');
            expect(entry.worldId).toBe(0);
        });

        test('polygon ids are shared across worlds, the latest load wins', () => {
            const system = createNavMeshSystem({ logger: silentLogger });

            loadNavMesh(system, { polys: [{ id: 1, center: [0, 0, 0] }] }, 0);
            loadNavMesh(system, { polys: [{ id: 1, center: [7, 0, 0] }] }, 1);

            expect(getPolygon(system, 1)?.center).toEqual([7, 0, 0]);
            expect(system.controllers.get(0)?.polyIds.has(1)).toBe(false);

            unloadNavMesh(system, 0);

            expect(getPolygon(system, 1)?.center).toEqual([7, 0, 0]);
        });

        test('keeps polygon ids in ascending order across loads and unloads', () => {
            const system = createNavMeshSystem({ logger: silentLogger });

            loadNavMesh(system, { polys: [{ id: 9, center: [0, 0, 0] }, { id: 4, center: [5, 0, 0] }] }, 0);
            loadNavMesh(system, { polys: [{ id: 6, center: [10, 0, 0] }, { id: 4, center: [15, 0, 0] }] }, 1);

            expect(system.polyIdOrder).toEqual([4, 6, 9]);

            unloadNavMesh(system, 0);

            expect(system.polyIdOrder).toEqual([4, 6]);
        });
    });

    describe('getPolygon', () => {
        test('returns a copy that does not change the nav mesh', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, createLineSource(2));
            const path = createNavMeshPath();

            expect(findPath(path, system, [0, 0, 0], [5, 0, 0])).toBe(PathFindResult.SUCCESS);

            const poly = getPolygon(system, 2);
            expect(poly).toBeDefined();
            if (!poly) return;

            poly.center[0] = 500;
            poly.neighbors.length = 0;
            getPolygon(system, 1)?.neighbors.splice(0);

            expect(getPolygon(system, 2)?.center).toEqual([5, 0, 0]);
            expect(getPolygon(system, 2)?.neighbors).toEqual([1]);
            expect(findPath(path, system, [0, 0, 0], [5, 0, 0])).toBe(PathFindResult.SUCCESS);
            expect(path.waypoints.map((w) => w.polyId)).toEqual([1, 2]);
        });

        test('returns undefined for an unknown id', () => {
            const system = createNavMeshSystem({ logger: silentLogger });

            expect(getPolygon(system, 1)).toBeUndefined();
        });
    });

    describe('unloadNavMesh', () => {
        test('returns false for an unknown world and keeps the active controller', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, createLineSource(2), 0);
            const active = getNavMeshController(system);

            expect(unloadNavMesh(system, 42)).toBe(false);
            expect(getNavMeshController(system)).toBe(active);
        });

        test('unloading the active world clears the active controller without promoting another', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, createLineSource(2), 0);
            loadNavMesh(system, { polys: [{ id: 10, center: [50, 0, 0] }] }, 1);

            expect(unloadNavMesh(system, 0)).toBe(true);

            expect(getNavMeshController(system)).toBeNull();
            expect(getPolygon(system, 1)).toBeUndefined();
            expect(getPolygon(system, 10)).toBeDefined();
            expect(unloadNavMesh(system, 0)).toBe(false);
        });

        test('a world loaded after the active one was unloaded becomes active', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, createLineSource(2), 0);
            unloadNavMesh(system, 0);

            loadNavMesh(system, createLineSource(2), 5);

            expect(getNavMeshController(system)?.worldId).toBe(5);
        });
    });

    describe('findPolygon', () => {
        test('returns the containing polygon', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, createLineSource(3));

            expect(findPolygon(system, [0, 0, 0])).toBe(1);
            expect(findPolygon(system, [3, 0, 0])).toBe(2);
            expect(findPolygon(system, [10, 10, 1])).toBe(3);
        });

        test('returns NULL_POLY_ID when nothing is within range', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, createLineSource(3));

            expect(findPolygon(system, [2.5, 0, 3])).toBe(NULL_POLY_ID);
        });

        test('falls back to the nearest polygon within maxDistance', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, {
                polys: [
                    { id: 1, center: [0, 0, 0] },
                    { id: 2, center: [10, 0, 0] },
                ],
            });

            expect(findPolygon(system, [4, 0, 0], 5)).toBe(1);
            expect(findPolygon(system, [4, 0, 0], 3)).toBe(NULL_POLY_ID);
        });

        test('rejects polygons outside the vertical band', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, {
                polys: [
                    { id: 1, center: [0, 0, 0] },
                    { id: 2, center: [0, 100, 0] },
                ],
            });

            expect(findPolygon(system, [0, 10, 0])).toBe(1);
            expect(findPolygon(system, [0, 90, 0])).toBe(2);
            expect(findPolygon(system, [0, -51, 0])).toBe(NULL_POLY_ID);

            setNavMeshParams(system, -10, 10);

            expect(findPolygon(system, [0, 30, 0])).toBe(NULL_POLY_ID);
            expect(findPolygon(system, [0, 95, 0])).toBe(2);
        });

        test('prefers a containing polygon over a nearer one that does not contain the position', () => {
            const system = createNavMeshSystem({ logger: silentLogger, containment: 'polygon' });
            loadNavMesh(system, {
                polys: [
                    { id: 1, vertices: square(0, 0, 10) },
                    { id: 2, vertices: square(6, 0, 0.5) },
                ],
            });

            expect(findPolygon(system, [5, 0, 0])).toBe(1);
            expect(findPolygon(system, [6, 0, 0])).toBe(1);
        });

        test('the lowest containing polygon id wins, not the nearest center', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, {
                polys: [
                    { id: 2, center: [3, 0, 0] },
                    { id: 1, center: [0, 0, 0] },
                ],
            });

            expect(findPolygon(system, [1.6, 0, 0])).toBe(1);
        });

        test('nearest distance ties go to the lowest polygon id', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            loadNavMesh(system, {
                polys: [
                    { id: 7, center: [-4, 0, 0] },
                    { id: 3, center: [4, 0, 0] },
                ],
            });

            expect(findPolygon(system, [0, 0, 0], 5)).toBe(3);
        });

        test('polygon containment falls back to the radius for degenerate polygons', () => {
            const system = createNavMeshSystem({ logger: silentLogger, containment: 'polygon' });
            const poly = createNavMeshPoly({ id: 1, center: [0, 0, 0] });

            expect(isPositionInPolygon(system, [1.5, 0, 0], poly)).toBe(true);
            expect(isPositionInPolygon(system, [2.5, 0, 0], poly)).toBe(false);
        });

        test('radius containment uses the configured radius', () => {
            const system = createNavMeshSystem({ logger: silentLogger, polyRadius: 3 });
            const poly = createNavMeshPoly({ id: 1, vertices: square(0, 0, 0.5) });

            expect(isPositionInPolygon(system, [3, 0, 0], poly)).toBe(true);
            expect(isPositionInPolygon(system, [3.1, 0, 0], poly)).toBe(false);
        });
    });

    describe('triggers', () => {
        test('ids are assigned in order and never reused', () => {
            const system = createNavMeshSystem({ logger: silentLogger });
            const trigger: NavMeshTrigger = {
                bounds: [
                    [0, 0, 0],
                    [1, 1, 1],
                ],
            };

            expect(addTrigger(system, trigger)).toBe(1);
            expect(addTrigger(system, trigger)).toBe(2);

            expect(removeTrigger(system, 1)).toBe(true);
            expect(removeTrigger(system, 1)).toBe(false);

            expect(addTrigger(system, trigger)).toBe(3);
            expect(system.triggers.size).toBe(2);

            updateTriggers(system);
            expect(system.triggers.size).toBe(2);
        });
    });

    test('drawNavMesh toggles debug drawing', () => {
        const system = createNavMeshSystem({ logger: silentLogger });

        expect(system.drawNavMesh).toBe(false);
        drawNavMesh(system, true);
        expect(system.drawNavMesh).toBe(true);
    });

    test('terminateNavMeshSystem releases every world and trigger', () => {
        const system = createNavMeshSystem({ logger: silentLogger });
        loadNavMesh(system, createLineSource(2), 0);
        loadNavMesh(system, createLineSource(2, 100), 1);
        addTrigger(system, {
            bounds: [
                [0, 0, 0],
                [1, 1, 1],
            ],
        });

        terminateNavMeshSystem(system);

        expect(system.controllers.size).toBe(0);
        expect(system.polys.size).toBe(0);
        expect(system.triggers.size).toBe(0);
        expect(getNavMeshController(system)).toBeNull();
    });
});
