/**
 * Layout resolution pipeline - no DOM dependencies.
 *
 * Turns a conflict-prone proposal (usually one item dragged onto others) into
 * a full non-overlapping arrangement:
 *
 * 1. Resolve overlaps: place sticky items, then wear down blocked movables
 * 2. Find free areas in what is left
 * 3. Balance: split areas (or placed items) until every unplaced item has one
 * 4. Place unplaced items into the largest areas
 * 5. Grow movables into leftover space
 *
 * Expected failures (too many items for the grid) come back as a
 * `{ success: false }` result without positions. Input rectangles outside
 * the grid are a contract violation and throw GridBoundsError.
 */

import { formatRect, toPixelRect } from '../grid-rect';
import { createOccupancyGrid, type OccupancyGrid } from '../occupancy-grid';
import type { GridRect, ResolvedPosition, ResolveInput, ResolveResult } from '../types';
import { balanceFreeAreas } from './area-balancer';
import { findFreeAreas } from './free-areas';
import { expandIntoFreeSpace } from './growth';
import { resolveOverlaps } from './overlap-resolver';
import { placeUnplacedItems } from './placer';

function logStage(enabled: boolean, stage: string, grid: OccupancyGrid, detail?: string): void {
	if (!enabled) return;
	console.debug(`[cellboard] ${stage}${detail ? `: ${detail}` : ''}\n${grid.format()}`);
}

/**
 * Resolve a layout for one drag/resize step.
 */
export function resolveLayout<T>(input: ResolveInput<T>): ResolveResult<T> {
	const {
		sticky,
		movable,
		columnWidth,
		rowHeight,
		gridColumns,
		gridRows,
		getPosition,
		debug = false,
	} = input;

	const grid = createOccupancyGrid(gridColumns, gridRows);

	const positions = new Map<T, GridRect>();
	for (const item of [...sticky, ...movable]) {
		const position = getPosition(item);
		grid.assertContains(position);
		positions.set(item, { ...position });
	}

	const unplaced = resolveOverlaps(grid, sticky, movable, positions);
	logStage(debug, 'overlaps resolved', grid, `${unplaced.length} unplaced`);

	const freeAreas = findFreeAreas(grid);
	logStage(debug, 'free areas', grid, freeAreas.map(formatRect).join(' '));

	const balance = balanceFreeAreas(grid, freeAreas, movable, unplaced, positions);
	if ('success' in balance) {
		logStage(debug, 'balancing failed', grid, balance.message);
		return balance;
	}
	logStage(debug, balance.balanced ? 'balanced' : 'balancing stopped early', grid, `${freeAreas.length} free area(s)`);

	const placementFailure = placeUnplacedItems(grid, freeAreas, unplaced, positions);
	if (placementFailure) {
		logStage(debug, 'placement failed', grid, placementFailure.message);
		return placementFailure;
	}

	expandIntoFreeSpace(grid, movable, positions);
	logStage(debug, 'expanded', grid);

	const resolved = new Map<T, ResolvedPosition>();
	for (const [item, position] of positions) {
		resolved.set(item, {
			grid: position,
			pixel: toPixelRect(position, columnWidth, rowHeight),
		});
	}
	return { success: true, positions: resolved };
}
