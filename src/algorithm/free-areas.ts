/**
 * Free-area discovery.
 *
 * Exhaustive on purpose: grids are tens of cells per axis, so every free
 * cell is tried as a top-left anchor and every free rectangle anchored
 * there is considered. Ties go to the first rectangle found in row-major
 * anchor order.
 */

import { rectArea } from '../grid-rect';
import type { OccupancyGrid } from '../occupancy-grid';
import type { GridRect } from '../types';

/**
 * freeRunDown[row][column] = number of free cells from (column, row) downward
 */
function computeFreeRunsDown(grid: OccupancyGrid): number[][] {
	const runs: number[][] = [];
	for (let row = 0; row < grid.rows; row++) {
		runs.push(new Array<number>(grid.columns).fill(0));
	}
	for (let row = grid.rows - 1; row >= 0; row--) {
		for (let column = 0; column < grid.columns; column++) {
			if (!grid.isOccupied(column, row)) {
				runs[row][column] = 1 + (row + 1 < grid.rows ? runs[row + 1][column] : 0);
			}
		}
	}
	return runs;
}

/**
 * Largest free rectangle anchored at (left, top).
 *
 * Expands width first; for each width the tallest free height is bounded by
 * the shortest free run among the covered columns. Expanding height first
 * visits the same set of rectangles later, so it can never win a tie.
 */
function largestAnchoredAt(
	grid: OccupancyGrid,
	runs: number[][],
	left: number,
	top: number,
): GridRect | null {
	let best: GridRect | null = null;
	let maxHeight = Infinity;
	for (let width = 1; left + width <= grid.columns; width++) {
		maxHeight = Math.min(maxHeight, runs[top][left + width - 1]);
		if (maxHeight === 0) break;
		const candidate: GridRect = { left, top, width, height: maxHeight };
		if (!best || rectArea(candidate) > rectArea(best)) {
			best = candidate;
		}
	}
	return best;
}

/**
 * Find the largest free rectangle in the grid, or null if every cell is taken
 */
export function findLargestFreeArea(grid: OccupancyGrid): GridRect | null {
	const runs = computeFreeRunsDown(grid);
	let best: GridRect | null = null;
	for (let top = 0; top < grid.rows; top++) {
		for (let left = 0; left < grid.columns; left++) {
			if (runs[top][left] === 0) continue;
			const candidate = largestAnchoredAt(grid, runs, left, top);
			if (candidate && (!best || rectArea(candidate) > rectArea(best))) {
				best = candidate;
			}
		}
	}
	return best;
}

/**
 * Decompose all free space into rectangles, largest first.
 * `grid` is not modified; a working copy absorbs each area as it is found.
 */
export function findFreeAreas(grid: OccupancyGrid): GridRect[] {
	const working = grid.clone();
	const areas: GridRect[] = [];
	let area = findLargestFreeArea(working);
	while (area) {
		areas.push(area);
		working.setRegion(area, true);
		area = findLargestFreeArea(working);
	}
	return areas;
}
