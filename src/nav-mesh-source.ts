import { readFile } from 'node:fs/promises';
import type { Vec3 } from 'mathcat';
import type { NavMeshPolyParams, NavMeshSource } from './query';

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const readNumber = (value: unknown, path: string): number => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new Error(`${path}: expected a finite number`);
    }
    return value;
};

const readOptionalNumber = (value: unknown, path: string): number | undefined => {
    return value === undefined ? undefined : readNumber(value, path);
};

const readVec3 = (value: unknown, path: string): Vec3 => {
    if (!Array.isArray(value) || value.length !== 3) {
        throw new Error(`${path}: expected [x, y, z]`);
    }
    return [readNumber(value[0], `${path}[0]`), readNumber(value[1], `${path}[1]`), readNumber(value[2], `${path}[2]`)];
};

const readArray = <T>(value: unknown, path: string, readItem: (item: unknown, itemPath: string) => T): T[] => {
    if (!Array.isArray(value)) {
        throw new Error(`${path}: expected an array`);
    }
    return value.map((item, i) => readItem(item, `${path}[${i}]`));
};

const readPolyId = (value: unknown, path: string): number => {
    const id = readNumber(value, path);
    if (!Number.isInteger(id) || id < 0) {
        throw new Error(`${path}: expected a non-negative integer id`);
    }
    return id;
};

const readPoly = (value: unknown, path: string): NavMeshPolyParams => {
    if (!isRecord(value)) {
        throw new Error(`${path}: expected an object`);
    }

    const vertices = value.vertices === undefined ? undefined : readArray(value.vertices, `${path}.vertices`, readVec3);
    const center = value.center === undefined ? undefined : readVec3(value.center, `${path}.center`);

    if (!vertices?.length && !center) {
        throw new Error(`${path}: expected vertices or a center`);
    }

    return {
        id: readPolyId(value.id, `${path}.id`),
        vertices,
        center,
        height: readOptionalNumber(value.height, `${path}.height`),
        neighbors: value.neighbors === undefined ? [] : readArray(value.neighbors, `${path}.neighbors`, readPolyId),
        flags: readOptionalNumber(value.flags, `${path}.flags`),
        area: readOptionalNumber(value.area, `${path}.area`),
    };
};

/**
 * Validates plain JSON data as a nav mesh source.
 * @throws Error naming the offending path if the data is malformed
 */
export const parseNavMeshSource = (data: unknown): NavMeshSource => {
    if (!isRecord(data)) {
        throw new Error('source: expected an object');
    }

    const name = data.name;
    if (name !== undefined && typeof name !== 'string') {
        throw new Error('source.name: expected a string');
    }

    return {
        name,
        polys: readArray(data.polys, 'source.polys', readPoly),
    };
};

/**
 * Reads a nav mesh source from a JSON file.
 */
export const readNavMeshSource = async (filePath: string | URL): Promise<NavMeshSource> => {
    const json = await readFile(filePath, 'utf8');
    return parseNavMeshSource(JSON.parse(json));
};
