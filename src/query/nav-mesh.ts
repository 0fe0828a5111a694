import type { Box3, Vec3 } from 'mathcat';
import type { Logger } from '../log';
import type { SearchNode, SearchNodePool } from './node';
import type { PathFindOptions } from './query-filter';

/** Polygon id reserved for "no polygon" */
export const NULL_POLY_ID = 0;

/** Terrain classification bits stored in NavMeshPoly.area */
export enum AreaFlags {
    /** normal walkable area */
    WALKABLE = 0x01,
    /** jump required */
    JUMP = 0x02,
    WATER = 0x04,
    DOOR = 0x08,
    STAIRS = 0x10,
    INDOORS = 0x20,
    /** navigation is not allowed */
    NO_NAVIGATION = 0x40,
    RESTRICTED = 0x80,
}

/** A walkable polygon of the navigation mesh */
export type NavMeshPoly = {
    /** unique, non-zero polygon id */
    id: number;

    /** boundary of the walkable region, in order */
    vertices: Vec3[];

    /** precomputed centroid */
    center: Vec3;

    /** reference Y used for vertical band checks */
    height: number;

    /** ids of adjacent polygons. ids that do not resolve are skipped by queries */
    neighbors: number[];

    /** user defined flags */
    flags: number;

    /** terrain type bitmask, @see AreaFlags */
    area: number;
};

export type NavMeshPolyParams = {
    id: number;
    vertices?: Vec3[];
    /** defaults to the mean of the vertices */
    center?: Vec3;
    /** defaults to the center's y */
    height?: number;
    neighbors?: number[];
    flags?: number;
    /** defaults to AreaFlags.WALKABLE */
    area?: number;
};

/** Populated polygon data for one world, as handed over by mesh ingestion */
export type NavMeshSource = {
    name?: string;
    polys: NavMeshPolyParams[];
};

/** Per-world handle. The polygons themselves live in NavMeshSystem.polys */
export type NavMeshController = {
    worldId: number;
    name: string;
    /** ids of the polygons this world owns */
    polyIds: Set<number>;
};

/** An opaque volume registered for enter / exit notification */
export type NavMeshTrigger = {
    bounds: Box3;
    userData?: unknown;
};

export type PolyContainmentMode = 'radius' | 'polygon';

export type NavMeshSystemConfig = {
    /** number of preallocated search nodes */
    nodePoolCapacity: number;

    /** offset from poly height to the bottom of the vertical band */
    checkBottom: number;

    /** offset from poly height to the top of the vertical band */
    checkTop: number;

    /** effective containment radius around a polygon center */
    polyRadius: number;

    /**
     * How a position is tested against a polygon's footprint.
     * 'radius' treats every polygon as a disc of `polyRadius` around its center.
     * 'polygon' tests against the polygon vertices, falling back to 'radius' for degenerate polygons.
     */
    containment: PolyContainmentMode;

    defaultOptions: PathFindOptions;

    logger: Logger;
};

/** Working state of the most recent search */
export type NavMeshSearchState = {
    openList: SearchNode[];
    closedList: SearchNode[];
    iterations: number;
    startPolyId: number;
    endPolyId: number;
};

export type NavMeshSystem = {
    /** all loaded polygons, keyed by id, across every world */
    polys: Map<number, NavMeshPoly>;

    /** ids of the loaded polygons in ascending order, the order queries visit them in */
    polyIdOrder: number[];

    /** controllers by world id */
    controllers: Map<number, NavMeshController>;

    /** the active controller, if any */
    activeController: NavMeshController | null;

    /** registered triggers by trigger id */
    triggers: Map<number, NavMeshTrigger>;

    nextTriggerId: number;

    nodePool: SearchNodePool;

    search: NavMeshSearchState;

    checkBottom: number;

    checkTop: number;

    polyRadius: number;

    containment: PolyContainmentMode;

    /** whether debug primitives should be produced */
    drawNavMesh: boolean;

    defaultOptions: PathFindOptions;

    logger: Logger;
};

export type NavMeshPathWaypoint = {
    position: Vec3;
    polyId: number;
};

/** An ordered sequence of waypoints from start to end */
export type NavMeshPath = {
    waypoints: NavMeshPathWaypoint[];
};

export enum PathFindResult {
    /** path found */
    SUCCESS = 0,
    /** path to the node closest to the goal */
    PARTIAL = 1,
    NO_PATH = 2,
    INVALID_START = 3,
    INVALID_END = 4,
    /** the search node pool was exhausted */
    OUT_OF_NODES = 5,
    /** reserved, not produced by the search loop */
    TIMEOUT = 6,
    ERROR = 7,
}
