/**
 * @module polynav
 */

export type { Box3, Vec3 } from 'mathcat';
export * from './debug';
export * as geometry from './geometry';
export * from './log';
export * from './nav-mesh-source';
export * from './query';
