/**
 * @fileoverview Bipartite assignment
 *
 * Maximum-weight matching between rows (columns) and columns (properties)
 * of a score matrix, using the Hungarian algorithm on quantised integer
 * weights so results do not depend on floating-point summation order.
 *
 * Ties: rows are inserted in order and an already matched row only gives
 * up its property when that strictly increases the total, so among
 * equal-weight assignments earlier rows keep the earliest matrix column.
 *
 * @module @ontocheck/engine/mapping/assignment
 */

/**
 * A selected (row, column) pair with its original score.
 */
export interface AssignmentPair {
    readonly row: number;
    readonly col: number;
    readonly score: number;
}

/** Weight quantisation: scores are compared at six decimal places. */
export const SCORE_SCALE = 1_000_000;

function quantize(score: number, minScore: number): number {
    if (!Number.isFinite(score) || score < minScore) {
        return 0;
    }
    return Math.round(Math.min(1, Math.max(0, score)) * SCORE_SCALE);
}

/**
 * Solve the maximum-weight one-to-one assignment.
 *
 * Pairs scoring below `minScore`, or scoring zero, are never selected.
 * Rows without an admissible partner stay unassigned.
 *
 * @param scores - Row-major matrix, every row the same length
 * @param minScore - Admission threshold
 * @returns Selected pairs ordered by row
 */
export function maximumWeightAssignment(
    scores: readonly (readonly number[])[],
    minScore: number
): AssignmentPair[] {
    const rows = scores.length;
    const cols = rows === 0 ? 0 : scores[0].length;

    if (rows === 0 || cols === 0) {
        return [];
    }

    // Pad with zero-weight dummy columns so every row can be placed
    const width = Math.max(rows, cols);
    const weights: number[][] = scores.map(row => {
        if (row.length !== cols) {
            throw new RangeError("Score matrix rows must have equal length");
        }
        const padded = row.map(score => quantize(score, minScore));
        while (padded.length < width) {
            padded.push(0);
        }
        return padded;
    });

    // Minimise cost = SCORE_SCALE - weight; 1-based arrays, index 0 is the virtual root
    const u = new Array<number>(rows + 1).fill(0);
    const v = new Array<number>(width + 1).fill(0);
    const match = new Array<number>(width + 1).fill(0);
    const way = new Array<number>(width + 1).fill(0);

    for (let i = 1; i <= rows; i++) {
        match[0] = i;
        let j0 = 0;
        const minv = new Array<number>(width + 1).fill(Infinity);
        const used = new Array<boolean>(width + 1).fill(false);

        do {
            used[j0] = true;
            const i0 = match[j0];
            let delta = Infinity;
            let j1 = 0;

            for (let j = 1; j <= width; j++) {
                if (used[j]) {
                    continue;
                }
                const cur = SCORE_SCALE - weights[i0 - 1][j - 1] - u[i0] - v[j];
                if (cur < minv[j]) {
                    minv[j] = cur;
                    way[j] = j0;
                }
                if (minv[j] < delta) {
                    delta = minv[j];
                    j1 = j;
                }
            }

            for (let j = 0; j <= width; j++) {
                if (used[j]) {
                    u[match[j]] += delta;
                    v[j] -= delta;
                }
                else {
                    minv[j] -= delta;
                }
            }

            j0 = j1;
        } while (match[j0] !== 0);

        do {
            const j1 = way[j0];
            match[j0] = match[j1];
            j0 = j1;
        } while (j0 !== 0);
    }

    const pairs: AssignmentPair[] = [];
    for (let j = 1; j <= cols; j++) {
        const row = match[j];
        if (row === 0 || weights[row - 1][j - 1] === 0) {
            continue;
        }
        pairs.push({ row: row - 1, col: j - 1, score: scores[row - 1][j - 1] });
    }

    return pairs.sort((a, b) => a.row - b.row);
}

/**
 * Independent best choice per row, allowing several rows per column.
 *
 * Ties go to the earlier matrix column.
 *
 * @param scores - Row-major matrix
 * @param minScore - Admission threshold
 */
export function bestPerRow(
    scores: readonly (readonly number[])[],
    minScore: number
): AssignmentPair[] {
    const pairs: AssignmentPair[] = [];

    scores.forEach((row, rowIndex) => {
        let best = -1;
        let bestWeight = 0;
        row.forEach((score, colIndex) => {
            const weight = quantize(score, minScore);
            if (weight > bestWeight) {
                best = colIndex;
                bestWeight = weight;
            }
        });
        if (best >= 0) {
            pairs.push({ row: rowIndex, col: best, score: row[best] });
        }
    });

    return pairs;
}

/**
 * Sum of scores of an assignment.
 */
export function assignmentTotal(pairs: readonly AssignmentPair[]): number {
    return pairs.reduce((sum, pair) => sum + pair.score, 0);
}
