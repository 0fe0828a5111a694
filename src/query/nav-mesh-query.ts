import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { distanceSqr2d } from '../geometry';
import { AreaFlags, type NavMeshPoly, type NavMeshSystem, NULL_POLY_ID } from './nav-mesh';
import { createNavMeshPoly, DEFAULT_FIND_POLYGON_DISTANCE, findPolygon } from './nav-mesh-api';

/**
 * Checks whether a position resolves to a polygon using the default search radius
 */
export const isPositionValid = (system: NavMeshSystem, position: Vec3): boolean => {
    return findPolygon(system, position, DEFAULT_FIND_POLYGON_DISTANCE) !== NULL_POLY_ID;
};

/**
 * Checks whether a position resolves to a polygon with the INDOORS area bit
 */
export const isIndoors = (system: NavMeshSystem, position: Vec3): boolean => {
    const poly = system.polys.get(findPolygon(system, position));
    if (!poly) return false;

    return (poly.area & AreaFlags.INDOORS) !== 0;
};

/**
 * Finds the nearest valid position within `maxDistance`.
 * The result is the input position snapped to the polygon's height.
 *
 * @param out receives the position, untouched if none is found
 * @returns whether a position was found
 */
export const findNearestValidPosition = (out: Vec3, system: NavMeshSystem, position: Vec3, maxDistance: number): boolean => {
    const poly = system.polys.get(findPolygon(system, position, maxDistance));
    if (!poly) return false;

    vec3.set(out, position[0], poly.height, position[2]);

    return true;
};

const queryPolygonsInRegion = (system: NavMeshSystem, center: Vec3, radius: number): NavMeshPoly[] => {
    const radiusSqr = radius * radius;
    const polys: NavMeshPoly[] = [];

    for (const polyId of system.polyIdOrder) {
        const poly = system.polys.get(polyId);
        if (poly && distanceSqr2d(poly.center, center) <= radiusSqr) {
            polys.push(poly);
        }
    }

    return polys;
};

/**
 * Gets copies of all polygons whose center lies within `radius` of `center` in the XZ plane, inclusive.
 * Polygons are returned in ascending id order.
 */
export const getPolygonsInRegion = (system: NavMeshSystem, center: Vec3, radius: number): NavMeshPoly[] => {
    return queryPolygonsInRegion(system, center, radius).map(createNavMeshPoly);
};

/**
 * Picks a random polygon from @see getPolygonsInRegion and writes its center to `out`.
 *
 * @param rand function returning a random number in [0, 1)
 * @returns false if the region contains no polygon
 */
export const getRandomPosition = (
    out: Vec3,
    system: NavMeshSystem,
    center: Vec3,
    radius: number,
    rand: () => number = Math.random,
): boolean => {
    const polys = queryPolygonsInRegion(system, center, radius);
    if (polys.length === 0) return false;

    const index = Math.min(Math.floor(rand() * polys.length), polys.length - 1);
    vec3.copy(out, polys[index].center);

    return true;
};

export type RayCastResult = {
    /** whether the ray hit anything */
    hit: boolean;
    /** the hit position */
    position: Vec3;
    /** the surface normal at the hit position */
    normal: Vec3;
    /** the distance to the hit */
    distance: number;
    /** the polygon that was hit */
    polyId: number;
};

export const createRayCastResult = (): RayCastResult => ({
    hit: false,
    position: [0, 0, 0],
    normal: [0, 1, 0],
    distance: 0,
    polyId: NULL_POLY_ID,
});

/**
 * Casts a ray against the nav mesh.
 * Mesh intersection is not supported: always reports no hit, with the end position and full distance.
 */
export const rayCast = (out: RayCastResult, _system: NavMeshSystem, start: Vec3, end: Vec3): boolean => {
    out.hit = false;
    vec3.copy(out.position, end);
    vec3.set(out.normal, 0, 1, 0);
    out.distance = vec3.distance(start, end);
    out.polyId = NULL_POLY_ID;

    return false;
};
