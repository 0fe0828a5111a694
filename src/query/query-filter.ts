import { AreaFlags } from './nav-mesh';

export type PathFindOptions = {
    /** maximum number of node expansions */
    maxIterations: number;

    /** maximum number of search nodes, capped by the node pool capacity */
    maxNodes: number;

    /** reserved path length ceiling, not applied by the search */
    maxDistance: number;

    /** reserved tolerance for the path optimization pass */
    straightPathTolerance: number;

    /** whether to run the path optimization pass */
    optimizePath: boolean;

    /** area bits a polygon must include to be expanded */
    areaFlags: number;

    /** area bits a polygon must not include to be expanded */
    excludedAreaFlags: number;

    /** reserved, in seconds. the search is bounded by maxIterations only */
    timeout: number;
};

export const DEFAULT_PATH_FIND_OPTIONS = {
    maxIterations: 2000,
    maxNodes: 4096,
    maxDistance: 1000,
    straightPathTolerance: 0.1,
    optimizePath: true,
    areaFlags: AreaFlags.WALKABLE,
    excludedAreaFlags: AreaFlags.NO_NAVIGATION,
    timeout: 1.0,
} satisfies PathFindOptions;

/**
 * Checks if a polygon area passes the options' area filter.
 * @param area the polygon area bits
 * @param options the include / exclude flags
 */
export const passAreaFilter = (area: number, options: Pick<PathFindOptions, 'areaFlags' | 'excludedAreaFlags'>): boolean => {
    return (area & options.areaFlags) !== 0 && (area & options.excludedAreaFlags) === 0;
};

/**
 * Merges overrides over base options.
 * Overrides that are present but undefined keep the base value.
 */
export const mergePathFindOptions = (base: PathFindOptions, overrides: Partial<PathFindOptions> = {}): PathFindOptions => {
    return {
        maxIterations: overrides.maxIterations ?? base.maxIterations,
        maxNodes: overrides.maxNodes ?? base.maxNodes,
        maxDistance: overrides.maxDistance ?? base.maxDistance,
        straightPathTolerance: overrides.straightPathTolerance ?? base.straightPathTolerance,
        optimizePath: overrides.optimizePath ?? base.optimizePath,
        areaFlags: overrides.areaFlags ?? base.areaFlags,
        excludedAreaFlags: overrides.excludedAreaFlags ?? base.excludedAreaFlags,
        timeout: overrides.timeout ?? base.timeout,
    };
};
