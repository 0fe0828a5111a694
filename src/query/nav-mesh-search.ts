import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { findPolygon } from './nav-mesh-api';
import { type NavMeshPath, type NavMeshSystem, NULL_POLY_ID, PathFindResult } from './nav-mesh';
import { allocateSearchNode, getSearchNode, resetSearchNodePool, type SearchNode } from './node';
import { DEFAULT_PATH_FIND_OPTIONS, passAreaFilter, type PathFindOptions } from './query-filter';

export type AreaFilter = Pick<PathFindOptions, 'areaFlags' | 'excludedAreaFlags'>;

const isValidBudget = (value: number) => Number.isInteger(value) && value >= 0;

const isFinitePosition = (v: Vec3) => Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2]);

const resetSearch = (system: NavMeshSystem): void => {
    resetSearchNodePool(system.nodePool);
    system.search.openList.length = 0;
    system.search.closedList.length = 0;
    system.search.iterations = 0;
    system.search.startPolyId = NULL_POLY_ID;
    system.search.endPolyId = NULL_POLY_ID;
};

/**
 * Writes the path from the start node to the given node into `out`,
 * by walking parent links back to the start and reversing.
 */
export const reconstructPath = (out: NavMeshPath, system: NavMeshSystem, endNode: SearchNode): NavMeshPath => {
    out.waypoints.length = 0;

    let node: SearchNode | undefined = endNode;
    while (node) {
        out.waypoints.push({ position: vec3.clone(node.position), polyId: node.polyId });
        node = node.parent === null ? undefined : getSearchNode(system.nodePool, node.parent);
    }

    out.waypoints.reverse();

    return out;
};

/**
 * Returns the open node with the lowest estimated cost to the goal,
 * the first encountered on ties.
 */
export const getBestPartialNode = (openList: SearchNode[]): SearchNode | undefined => {
    let best: SearchNode | undefined;

    for (const node of openList) {
        if (!best || node.heuristic < best.heuristic) {
            best = node;
        }
    }

    return best;
};

const popBestOpenNode = (openList: SearchNode[]): SearchNode | undefined => {
    if (openList.length === 0) return undefined;

    // linear scan, the first encountered minimum wins
    let bestIndex = 0;
    for (let i = 1; i < openList.length; i++) {
        if (openList[i].totalCost < openList[bestIndex].totalCost) {
            bestIndex = i;
        }
    }

    const [node] = openList.splice(bestIndex, 1);
    return node;
};

const _candidatePosition = vec3.create();

/**
 * Finds a path between two world positions with A* over polygon adjacency.
 *
 * The search moves through waypoints between polygon centers. Start and end
 * positions are resolved with @see findPolygon using the default radius.
 *
 * Search state is reset at the start of every call and kept on the system afterwards.
 *
 * @param out receives the path, cleared on every call
 * @param maxIterations maximum number of node expansions
 * @param maxNodeCount maximum number of search nodes, capped by the pool capacity
 * @param filter area filter applied to neighbor polygons
 * @returns the result code
 */
export const findNodePath = (
    out: NavMeshPath,
    system: NavMeshSystem,
    start: Vec3,
    end: Vec3,
    maxIterations: number,
    maxNodeCount: number,
    filter: AreaFilter = DEFAULT_PATH_FIND_OPTIONS,
): PathFindResult => {
    const { nodePool, search, logger } = system;

    out.waypoints.length = 0;
    resetSearch(system);

    logger.debug({ maxIterations, maxNodeCount }, 'find node path');

    if (!isValidBudget(maxIterations) || !isValidBudget(maxNodeCount)) {
        return PathFindResult.ERROR;
    }

    // resolve start and end polygons
    const startPolyId = isFinitePosition(start) ? findPolygon(system, start) : NULL_POLY_ID;
    if (startPolyId === NULL_POLY_ID) {
        return PathFindResult.INVALID_START;
    }

    const endPolyId = isFinitePosition(end) ? findPolygon(system, end) : NULL_POLY_ID;
    if (endPolyId === NULL_POLY_ID) {
        return PathFindResult.INVALID_END;
    }

    search.startPolyId = startPolyId;
    search.endPolyId = endPolyId;

    // seed the search
    const startNode = allocateSearchNode(nodePool, maxNodeCount);
    if (!startNode) {
        return PathFindResult.OUT_OF_NODES;
    }

    vec3.copy(startNode.position, start);
    startNode.polyId = startPolyId;
    startNode.cost = 0;
    startNode.heuristic = vec3.distance(start, end);
    startNode.totalCost = startNode.heuristic;
    startNode.parent = null;

    search.openList.push(startNode);

    // start and end share a polygon
    if (startPolyId === endPolyId) {
        search.openList.length = 0;
        search.closedList.push(startNode);
        reconstructPath(out, system, startNode);
        return PathFindResult.SUCCESS;
    }

    // membership by poly id
    const openByPoly = new Map<number, SearchNode>([[startPolyId, startNode]]);
    const closedPolys = new Set<number>();

    while (search.openList.length > 0 && search.iterations < maxIterations) {
        // remove node from the open list and put it in the closed list
        const current = popBestOpenNode(search.openList);
        if (!current) break;

        openByPoly.delete(current.polyId);
        search.closedList.push(current);
        closedPolys.add(current.polyId);

        // if we have reached the goal, stop searching
        if (current.polyId === endPolyId) {
            reconstructPath(out, system, current);
            logger.debug({ iterations: search.iterations, nodes: nodePool.allocatedCount }, 'path found');
            return PathFindResult.SUCCESS;
        }

        const currentPoly = system.polys.get(current.polyId);

        for (const neighborId of currentPoly?.neighbors ?? []) {
            if (closedPolys.has(neighborId)) continue;

            // dangling adjacency
            const neighborPoly = system.polys.get(neighborId);
            if (!neighborPoly) continue;

            if (!passAreaFilter(neighborPoly.area, filter)) continue;

            _candidatePosition[0] = (current.position[0] + neighborPoly.center[0]) * 0.5;
            _candidatePosition[1] = (current.position[1] + neighborPoly.center[1]) * 0.5;
            _candidatePosition[2] = (current.position[2] + neighborPoly.center[2]) * 0.5;

            const newCost = current.cost + vec3.distance(current.position, _candidatePosition);

            // the existing path is at least as good
            const existing = openByPoly.get(neighborId);
            if (existing && existing.cost <= newCost) continue;

            let neighborNode: SearchNode;
            if (existing) {
                neighborNode = existing;
            } else {
                const allocated = allocateSearchNode(nodePool, maxNodeCount);
                if (!allocated) {
                    logger.debug({ iterations: search.iterations, capacity: nodePool.capacity, maxNodeCount }, 'out of search nodes');
                    return PathFindResult.OUT_OF_NODES;
                }
                neighborNode = allocated;
                search.openList.push(neighborNode);
                openByPoly.set(neighborId, neighborNode);
            }

            vec3.copy(neighborNode.position, _candidatePosition);
            neighborNode.polyId = neighborId;
            neighborNode.cost = newCost;
            neighborNode.heuristic = vec3.distance(_candidatePosition, end);
            neighborNode.totalCost = neighborNode.cost + neighborNode.heuristic;
            neighborNode.parent = current.index;
        }

        search.iterations++;
    }

    // best effort: the open node closest to the goal
    const bestPartialNode = getBestPartialNode(search.openList);
    if (bestPartialNode) {
        reconstructPath(out, system, bestPartialNode);
        logger.debug({ iterations: search.iterations, polyId: bestPartialNode.polyId }, 'partial path');
        return PathFindResult.PARTIAL;
    }

    logger.debug({ iterations: search.iterations }, 'no path');

    return PathFindResult.NO_PATH;
};

/**
 * Continues a search from a previous partial result.
 * Not supported: search state is not retained across calls, always returns NO_PATH.
 */
export const continuePath = (
    _out: NavMeshPath,
    _system: NavMeshSystem,
    _maxIterations: number,
    _maxNodeCount: number,
): PathFindResult => {
    return PathFindResult.NO_PATH;
};
