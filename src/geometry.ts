import type { Vec3 } from 'mathcat';

/**
 * Squared distance between two points in 2D (XZ plane)
 */
export const distanceSqr2d = (a: Vec3, b: Vec3): number => {
    const dx = b[0] - a[0];
    const dz = b[2] - a[2];
    return dx * dx + dz * dz;
};

/**
 * Tests if a point is inside a polygon in 2D (XZ plane).
 * Points on an edge or vertex are considered inside.
 */
export const pointInPoly = (point: Vec3, vertices: Vec3[]): boolean => {
    let inside = false;
    const x = point[0];
    const z = point[2];
    const l = vertices.length;
    for (let i = 0, j = l - 1; i < l; j = i++) {
        const xj = vertices[j][0],
            zj = vertices[j][2],
            xi = vertices[i][0],
            zi = vertices[i][2];
        const where = (zi - zj) * (x - xi) - (xi - xj) * (z - zi);
        if (zj < zi) {
            if (z >= zj && z < zi) {
                if (where === 0) {
                    // point on the line
                    return true;
                }
                if (where > 0) {
                    if (z === zj) {
                        // ray intersects vertex
                        if (z > vertices[j === 0 ? l - 1 : j - 1][2]) {
                            inside = !inside;
                        }
                    } else {
                        inside = !inside;
                    }
                }
            }
        } else if (zi < zj) {
            if (z > zi && z <= zj) {
                if (where === 0) {
                    // point on the line
                    return true;
                }
                if (where < 0) {
                    if (z === zj) {
                        // ray intersects vertex
                        if (z < vertices[j === 0 ? l - 1 : j - 1][2]) {
                            inside = !inside;
                        }
                    } else {
                        inside = !inside;
                    }
                }
            }
        } else if (z === zi && ((x >= xj && x <= xi) || (x >= xi && x <= xj))) {
            // point on horizontal edge
            return true;
        }
    }
    return inside;
};

/**
 * Computes the mean of a set of vertices. Returns the origin for an empty set.
 */
export const polyCentroid = (out: Vec3, vertices: Vec3[]): Vec3 => {
    out[0] = 0;
    out[1] = 0;
    out[2] = 0;

    if (vertices.length === 0) return out;

    for (const v of vertices) {
        out[0] += v[0];
        out[1] += v[1];
        out[2] += v[2];
    }

    const inv = 1 / vertices.length;
    out[0] *= inv;
    out[1] *= inv;
    out[2] *= inv;

    return out;
};
