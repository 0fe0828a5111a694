import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { distanceSqr2d, pointInPoly, polyCentroid } from '../geometry';
import { logger } from '../log';
import {
    AreaFlags,
    type NavMeshController,
    type NavMeshPoly,
    type NavMeshPolyParams,
    type NavMeshSource,
    type NavMeshSystem,
    type NavMeshSystemConfig,
    type NavMeshTrigger,
    NULL_POLY_ID,
} from './nav-mesh';
import { createSearchNodePool, resetSearchNodePool } from './node';
import { DEFAULT_PATH_FIND_OPTIONS, mergePathFindOptions, type PathFindOptions } from './query-filter';

/** Search radius used to resolve path endpoints */
export const DEFAULT_FIND_POLYGON_DISTANCE = 2.0;

export type NavMeshSystemConfigParams = Partial<Omit<NavMeshSystemConfig, 'defaultOptions'>> & {
    defaultOptions?: Partial<PathFindOptions>;
};

export const DEFAULT_NAV_MESH_SYSTEM_CONFIG = {
    nodePoolCapacity: 4096,
    checkBottom: -50,
    checkTop: 50,
    polyRadius: 2.0,
    containment: 'radius',
    defaultOptions: DEFAULT_PATH_FIND_OPTIONS,
    logger,
} satisfies NavMeshSystemConfig;

export const createNavMeshSystem = (config: NavMeshSystemConfigParams = {}): NavMeshSystem => {
    const nodePoolCapacity = config.nodePoolCapacity ?? DEFAULT_NAV_MESH_SYSTEM_CONFIG.nodePoolCapacity;

    return {
        polys: new Map(),
        polyIdOrder: [],
        controllers: new Map(),
        activeController: null,
        triggers: new Map(),
        nextTriggerId: 1,
        nodePool: createSearchNodePool(nodePoolCapacity),
        search: {
            openList: [],
            closedList: [],
            iterations: 0,
            startPolyId: NULL_POLY_ID,
            endPolyId: NULL_POLY_ID,
        },
        checkBottom: config.checkBottom ?? DEFAULT_NAV_MESH_SYSTEM_CONFIG.checkBottom,
        checkTop: config.checkTop ?? DEFAULT_NAV_MESH_SYSTEM_CONFIG.checkTop,
        polyRadius: config.polyRadius ?? DEFAULT_NAV_MESH_SYSTEM_CONFIG.polyRadius,
        containment: config.containment ?? DEFAULT_NAV_MESH_SYSTEM_CONFIG.containment,
        drawNavMesh: false,
        defaultOptions: mergePathFindOptions(DEFAULT_PATH_FIND_OPTIONS, config.defaultOptions),
        logger: config.logger ?? DEFAULT_NAV_MESH_SYSTEM_CONFIG.logger,
    };
};

/**
 * Creates a polygon from params, filling in derived fields.
 * Vertex, center and neighbor data is copied.
 */
export const createNavMeshPoly = (params: NavMeshPolyParams): NavMeshPoly => {
    const vertices = (params.vertices ?? []).map((v) => vec3.clone(v));
    const center = params.center ? vec3.clone(params.center) : polyCentroid(vec3.create(), vertices);

    return {
        id: params.id,
        vertices,
        center,
        height: params.height ?? center[1],
        neighbors: [...(params.neighbors ?? [])],
        flags: params.flags ?? 0,
        area: params.area ?? AreaFlags.WALKABLE,
    };
};

/** index of the first id in the ascending list that is >= polyId */
const lowerBound = (ids: number[], polyId: number): number => {
    let lo = 0;
    let hi = ids.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (ids[mid] < polyId) lo = mid + 1;
        else hi = mid;
    }
    return lo;
};

const insertPolyId = (system: NavMeshSystem, polyId: number): void => {
    const i = lowerBound(system.polyIdOrder, polyId);
    if (system.polyIdOrder[i] !== polyId) {
        system.polyIdOrder.splice(i, 0, polyId);
    }
};

const removePolyId = (system: NavMeshSystem, polyId: number): void => {
    const i = lowerBound(system.polyIdOrder, polyId);
    if (system.polyIdOrder[i] === polyId) {
        system.polyIdOrder.splice(i, 1);
    }
};

const destroyController = (system: NavMeshSystem, controller: NavMeshController): void => {
    for (const polyId of controller.polyIds) {
        system.polys.delete(polyId);
        removePolyId(system, polyId);
    }
    controller.polyIds.clear();

    system.controllers.delete(controller.worldId);

    if (system.activeController === controller) {
        system.activeController = null;
    }
};

const findPolyOwner = (system: NavMeshSystem, polyId: number): NavMeshController | undefined => {
    for (const controller of system.controllers.values()) {
        if (controller.polyIds.has(polyId)) return controller;
    }
    return undefined;
};

/**
 * Loads populated polygon data for a world.
 *
 * Any existing controller for the world is destroyed first, along with its polygons.
 * Polygon ids share one space across all worlds: a polygon whose id is owned by another
 * world replaces it.
 *
 * The new controller becomes active if no controller is active.
 *
 * @returns always true
 */
export const loadNavMesh = (system: NavMeshSystem, source: NavMeshSource, worldId = 0): boolean => {
    const existing = system.controllers.get(worldId);
    if (existing) {
        destroyController(system, existing);
    }

    const controller: NavMeshController = {
        worldId,
        name: source.name ?? `world-${worldId}`,
        polyIds: new Set(),
    };

    system.controllers.set(worldId, controller);

    for (const params of source.polys) {
        if (params.id === NULL_POLY_ID) {
            system.logger.warn({ worldId }, 'skipping polygon with reserved id 0');
            continue;
        }

        if (controller.polyIds.has(params.id)) {
            system.logger.warn({ worldId, polyId: params.id }, 'duplicate polygon id in source, replacing');
        } else {
            const owner = findPolyOwner(system, params.id);
            if (owner) {
                system.logger.warn(
                    { worldId, polyId: params.id, ownerWorldId: owner.worldId },
                    'polygon id already loaded by another world, replacing',
                );
                owner.polyIds.delete(params.id);
            }
        }

        system.polys.set(params.id, createNavMeshPoly(params));
        insertPolyId(system, params.id);
        controller.polyIds.add(params.id);
    }

    if (!system.activeController) {
        system.activeController = controller;
    }

    system.logger.info({ worldId, name: controller.name, polys: controller.polyIds.size }, 'loaded nav mesh');

    return true;
};

/**
 * Unloads a world and its polygons.
 * If the world was active, no controller is active afterwards.
 * @returns false if the world has no controller
 */
export const unloadNavMesh = (system: NavMeshSystem, worldId: number): boolean => {
    const controller = system.controllers.get(worldId);
    if (!controller) {
        return false;
    }

    destroyController(system, controller);

    system.logger.info({ worldId }, 'unloaded nav mesh');

    return true;
};

export const getNavMeshController = (system: NavMeshSystem): NavMeshController | null => {
    return system.activeController;
};

/**
 * Gets a copy of a loaded polygon.
 * Changes to the copy do not reach the nav mesh.
 */
export const getPolygon = (system: NavMeshSystem, polyId: number): NavMeshPoly | undefined => {
    const poly = system.polys.get(polyId);
    return poly ? createNavMeshPoly(poly) : undefined;
};

/**
 * Sets the vertical band, relative to a polygon's height, in which positions are matched to the polygon
 */
export const setNavMeshParams = (system: NavMeshSystem, checkBottom: number, checkTop: number): void => {
    system.checkBottom = checkBottom;
    system.checkTop = checkTop;
};

export const drawNavMesh = (system: NavMeshSystem, draw: boolean): void => {
    system.drawNavMesh = draw;
};

/**
 * Registers a trigger volume.
 * @returns the trigger id, ids are never reused
 */
export const addTrigger = (system: NavMeshSystem, trigger: NavMeshTrigger): number => {
    const triggerId = system.nextTriggerId++;
    system.triggers.set(triggerId, trigger);
    return triggerId;
};

export const removeTrigger = (system: NavMeshSystem, triggerId: number): boolean => {
    return system.triggers.delete(triggerId);
};

/**
 * Checks trigger volumes for enter / exit.
 * Currently a no-op, the system does not track agents.
 */
export const updateTriggers = (_system: NavMeshSystem): void => {};

/**
 * Destroys every controller and trigger and resets search state
 */
export const terminateNavMeshSystem = (system: NavMeshSystem): void => {
    for (const controller of [...system.controllers.values()]) {
        destroyController(system, controller);
    }
    system.activeController = null;
    system.triggers.clear();

    resetSearchNodePool(system.nodePool);
    system.search.openList.length = 0;
    system.search.closedList.length = 0;
    system.search.iterations = 0;
    system.search.startPolyId = NULL_POLY_ID;
    system.search.endPolyId = NULL_POLY_ID;
};

/**
 * Tests whether a position lies within a polygon's horizontal footprint
 */
export const isPositionInPolygon = (system: NavMeshSystem, position: Vec3, poly: NavMeshPoly): boolean => {
    if (system.containment === 'polygon' && poly.vertices.length >= 3) {
        return pointInPoly(position, poly.vertices);
    }

    return distanceSqr2d(position, poly.center) <= system.polyRadius * system.polyRadius;
};

/**
 * Finds the polygon for a position.
 *
 * Polygons are visited in ascending id order, and only polygons whose vertical band
 * contains the position are considered. The first polygon containing the position wins,
 * otherwise the polygon with the nearest center within `maxDistance` is returned,
 * the lowest id on ties. Distances are measured in the XZ plane.
 *
 * @returns the polygon id, or NULL_POLY_ID
 */
export const findPolygon = (system: NavMeshSystem, position: Vec3, maxDistance = DEFAULT_FIND_POLYGON_DISTANCE): number => {
    let nearestPolyId = NULL_POLY_ID;
    let nearestDistSqr = maxDistance * maxDistance;

    for (const polyId of system.polyIdOrder) {
        const poly = system.polys.get(polyId);
        if (!poly) continue;

        // vertical band
        if (position[1] < poly.height + system.checkBottom || position[1] > poly.height + system.checkTop) {
            continue;
        }

        if (isPositionInPolygon(system, position, poly)) {
            return poly.id;
        }

        const distSqr = distanceSqr2d(position, poly.center);
        if (distSqr < nearestDistSqr) {
            nearestPolyId = poly.id;
            nearestDistSqr = distSqr;
        }
    }

    return nearestPolyId;
};
