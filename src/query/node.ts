import type { Vec3 } from 'mathcat';
import { NULL_POLY_ID } from './nav-mesh';

export type SearchNode = {
    /** the slot of the node in its pool */
    index: number;
    /** whether the node is currently allocated */
    allocated: boolean;
    /** the position of the node, a waypoint between polygon centers */
    position: Vec3;
    /** the polygon this node represents */
    polyId: number;
    /** the cost from the start up to this node */
    cost: number;
    /** the estimated cost from this node to the goal */
    heuristic: number;
    /** cost + heuristic */
    totalCost: number;
    /** the slot of the parent node, or null for the start node */
    parent: number | null;
};

/** Fixed capacity arena of search nodes */
export type SearchNodePool = {
    nodes: SearchNode[];
    capacity: number;
    allocatedCount: number;
};

export const createSearchNodePool = (capacity: number): SearchNodePool => {
    const nodes: SearchNode[] = [];

    for (let i = 0; i < capacity; i++) {
        nodes.push({
            index: i,
            allocated: false,
            position: [0, 0, 0],
            polyId: NULL_POLY_ID,
            cost: 0,
            heuristic: 0,
            totalCost: 0,
            parent: null,
        });
    }

    return {
        nodes,
        capacity,
        allocatedCount: 0,
    };
};

/**
 * Allocates the first free node of the pool.
 *
 * Fields other than the liveness bit are left as they were,
 * callers must write every field they read.
 *
 * @param limit caps the number of live nodes below the pool capacity
 * @returns the node, or null if the pool (or limit) is exhausted
 */
export const allocateSearchNode = (pool: SearchNodePool, limit: number = pool.capacity): SearchNode | null => {
    if (pool.allocatedCount >= Math.min(limit, pool.capacity)) {
        return null;
    }

    for (const node of pool.nodes) {
        if (!node.allocated) {
            node.allocated = true;
            pool.allocatedCount++;
            return node;
        }
    }

    return null;
};

export const freeSearchNode = (pool: SearchNodePool, node: SearchNode): void => {
    if (!node.allocated) return;

    node.allocated = false;
    node.parent = null;
    pool.allocatedCount--;
};

export const resetSearchNodePool = (pool: SearchNodePool): void => {
    for (const node of pool.nodes) {
        node.allocated = false;
        node.parent = null;
    }
    pool.allocatedCount = 0;
};

export const getSearchNode = (pool: SearchNodePool, index: number): SearchNode | undefined => {
    const node = pool.nodes[index];
    if (!node || !node.allocated) return undefined;
    return node;
};
