/**
 * Growth expansion - last stage of a layout pass.
 *
 * Movable items take turns growing by one cell row/column, one direction per
 * round (left, top, right, bottom, left, ...). Earlier items in enumeration
 * order get first claim on contested cells.
 */

import { rectBottom, rectRight } from '../grid-rect';
import type { OccupancyGrid } from '../occupancy-grid';
import type { GridRect } from '../types';
import { requirePosition } from './overlap-resolver';

export type GrowthDirection = 'left' | 'top' | 'right' | 'bottom';

export const GROWTH_ORDER: readonly GrowthDirection[] = ['left', 'top', 'right', 'bottom'];

/**
 * Per-item growth state: one exhausted flag per direction
 */
export type ExhaustedFlags = Record<GrowthDirection, boolean>;

export function createExhaustedFlags(): ExhaustedFlags {
	return { left: false, top: false, right: false, bottom: false };
}

export function isFullyExhausted(flags: ExhaustedFlags): boolean {
	return GROWTH_ORDER.every((direction) => flags[direction]);
}

/**
 * The strip of cells an item would newly cover by growing one step,
 * or null when that step leaves the grid.
 */
export function growthStrip(
	rect: GridRect,
	direction: GrowthDirection,
	columns: number,
	rows: number,
): GridRect | null {
	switch (direction) {
		case 'left':
			return rect.left > 0 ? { left: rect.left - 1, top: rect.top, width: 1, height: rect.height } : null;
		case 'top':
			return rect.top > 0 ? { left: rect.left, top: rect.top - 1, width: rect.width, height: 1 } : null;
		case 'right':
			return rectRight(rect) < columns ? { left: rectRight(rect), top: rect.top, width: 1, height: rect.height } : null;
		case 'bottom':
			return rectBottom(rect) < rows ? { left: rect.left, top: rectBottom(rect), width: rect.width, height: 1 } : null;
		default: {
			const unreachable: never = direction;
			return unreachable;
		}
	}
}

export function grow(rect: GridRect, direction: GrowthDirection): GridRect {
	switch (direction) {
		case 'left':
			return { ...rect, left: rect.left - 1, width: rect.width + 1 };
		case 'top':
			return { ...rect, top: rect.top - 1, height: rect.height + 1 };
		case 'right':
			return { ...rect, width: rect.width + 1 };
		case 'bottom':
			return { ...rect, height: rect.height + 1 };
		default: {
			const unreachable: never = direction;
			return unreachable;
		}
	}
}

/**
 * Grow every movable item until no direction is left for any of them.
 * Mutates `positions` and `grid`.
 */
export function expandIntoFreeSpace<T>(
	grid: OccupancyGrid,
	movable: readonly T[],
	positions: Map<T, GridRect>,
): void {
	const flags = new Map<T, ExhaustedFlags>();
	for (const item of movable) {
		flags.set(item, createExhaustedFlags());
	}

	let round = 0;
	while (Array.from(flags.values()).some((f) => !isFullyExhausted(f))) {
		const direction = GROWTH_ORDER[round % GROWTH_ORDER.length];
		round++;

		for (const [item, itemFlags] of flags) {
			if (itemFlags[direction]) continue;

			const position = requirePosition(positions, item);
			const strip = growthStrip(position, direction, grid.columns, grid.rows);
			if (!strip || !grid.isRegionFree(strip)) {
				itemFlags[direction] = true;
				continue;
			}

			positions.set(item, grow(position, direction));
			grid.setRegion(strip, true);
		}
	}
}
