export * from './find-path';
export * from './nav-mesh';
export * from './nav-mesh-api';
export * from './nav-mesh-query';
export * from './nav-mesh-search';
export * from './node';
export * from './query-filter';
