/**
 * Overlap resolution - first stage of a layout pass.
 *
 * Sticky rectangles are placed unconditionally. Each movable rectangle is
 * then placed in caller order; a blocked one is worn down from its top-left
 * corner (shift right, shift down, narrow, shorten, repeat) until some
 * reduction is free. A rectangle that gets down to a single blocked cell is
 * reported as unplaced.
 */

import { isSingleCell } from '../grid-rect';
import type { OccupancyGrid } from '../occupancy-grid';
import type { GridRect } from '../types';

export type Reduction = 'shift-right' | 'shift-down' | 'narrow' | 'shorten';

/** Fixed rotation order, kept for layout stability across passes */
export const REDUCTION_ORDER: readonly Reduction[] = ['shift-right', 'shift-down', 'narrow', 'shorten'];

/** Where unplaced items wait until the placer assigns them a free area */
export const UNPLACED_PLACEHOLDER: Readonly<GridRect> = { left: 0, top: 0, width: 1, height: 1 };

export function applyReduction(rect: GridRect, reduction: Reduction): GridRect {
	switch (reduction) {
		case 'shift-right':
			return { ...rect, left: rect.left + 1 };
		case 'shift-down':
			return { ...rect, top: rect.top + 1 };
		case 'narrow':
			return { ...rect, width: rect.width - 1 };
		case 'shorten':
			return { ...rect, height: rect.height - 1 };
		default: {
			const unreachable: never = reduction;
			return unreachable;
		}
	}
}

/**
 * Find the first free reduction of `rect`, or null when it wears down to a
 * single blocked cell. Reductions that leave the grid are skipped.
 */
export function reduceUntilFree(grid: OccupancyGrid, rect: GridRect): GridRect | null {
	let candidate = rect;
	let step = 0;
	while (!grid.isRegionFree(candidate)) {
		if (isSingleCell(candidate)) {
			return null;
		}
		// A reduction that leaves the grid or degenerates is not adopted;
		// the next direction is tried instead
		let next: GridRect;
		do {
			next = applyReduction(candidate, REDUCTION_ORDER[step % REDUCTION_ORDER.length]);
			step++;
		} while (!grid.contains(next));
		candidate = next;
	}
	return candidate;
}

/**
 * Place sticky then movable items into `grid`, updating `positions`.
 *
 * @returns Movable items that could not be placed, in enumeration order
 */
export function resolveOverlaps<T>(
	grid: OccupancyGrid,
	sticky: readonly T[],
	movable: readonly T[],
	positions: Map<T, GridRect>,
): T[] {
	for (const item of sticky) {
		grid.setRegion(requirePosition(positions, item), true);
	}

	const unplaced: T[] = [];
	for (const item of movable) {
		const placed = reduceUntilFree(grid, requirePosition(positions, item));
		if (placed) {
			positions.set(item, placed);
			grid.setRegion(placed, true);
		} else {
			positions.set(item, { ...UNPLACED_PLACEHOLDER });
			unplaced.push(item);
		}
	}
	return unplaced;
}

export function requirePosition<T>(positions: ReadonlyMap<T, GridRect>, item: T): GridRect {
	const position = positions.get(item);
	if (!position) {
		throw new Error('Item has no seeded position');
	}
	return position;
}
