import type { Vec3 } from 'mathcat';
import type { NavMeshPath, NavMeshSystem } from './nav-mesh';
import { PathFindResult } from './nav-mesh';
import { findNodePath } from './nav-mesh-search';
import { mergePathFindOptions, type PathFindOptions } from './query-filter';

export const createNavMeshPath = (): NavMeshPath => ({
    waypoints: [],
});

/**
 * Merges caller options over the system's default path find options, undefined values are ignored
 */
export const resolvePathFindOptions = (system: NavMeshSystem, options?: Partial<PathFindOptions>): PathFindOptions => {
    return mergePathFindOptions(system.defaultOptions, options);
};

/**
 * Waypoint reduction pass.
 * Currently leaves the path unchanged, paths are not smoothed.
 */
export const optimizePath = (path: NavMeshPath, _tolerance: number): NavMeshPath => {
    return path;
};

/**
 * Find a path between two positions on the nav mesh.
 *
 * If the end polygon cannot be reached within the iteration budget,
 * the path leads to the searched node nearest the end and the result is PARTIAL.
 *
 * Internally:
 * - resolves options over the system defaults with @see resolvePathFindOptions
 * - finds a node path with @see findNodePath
 * - runs @see optimizePath if enabled
 *
 * @param out receives the path
 * @param system the nav mesh system
 * @param start the starting position in world space
 * @param end the ending position in world space
 * @param options overrides for the system's default options
 * @returns the result code
 */
export const findPath = (
    out: NavMeshPath,
    system: NavMeshSystem,
    start: Vec3,
    end: Vec3,
    options?: Partial<PathFindOptions>,
): PathFindResult => {
    const resolved = resolvePathFindOptions(system, options);

    const result = findNodePath(out, system, start, end, resolved.maxIterations, resolved.maxNodes, resolved);

    if ((result === PathFindResult.SUCCESS || result === PathFindResult.PARTIAL) && resolved.optimizePath) {
        optimizePath(out, resolved.straightPathTolerance);
    }

    return result;
};
