/**
 * Pointer interaction math - turns movement deltas into grid targets.
 *
 * The pixel rectangle accumulates raw movement so sub-cell motion is not
 * lost between events; each event snaps it to the nearest cells.
 */

import type { InteractionType } from './state-machine';
import type { GridRect, PixelRect } from './types';

export interface GridMetrics {
	columnWidth: number;
	rowHeight: number;
	gridColumns: number;
	gridRows: number;
}

/**
 * Add a pointer movement to the pixel rectangle.
 * Moving shifts the rectangle, resizing drags its bottom-right corner.
 */
export function applyMovement(
	rect: PixelRect,
	type: InteractionType,
	movementX: number,
	movementY: number,
): PixelRect {
	switch (type) {
		case 'move':
			return { ...rect, left: rect.left + movementX, top: rect.top + movementY };
		case 'resize':
			return { ...rect, width: rect.width + movementX, height: rect.height + movementY };
		default: {
			const unreachable: never = type;
			return unreachable;
		}
	}
}

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

/**
 * Snap a pixel rectangle to the grid, keeping the result inside it.
 *
 * Move keeps the size and pushes the rectangle back inside when it passes
 * the right/bottom edge. Resize keeps the top-left corner and caps the size
 * at the remaining columns/rows.
 */
export function snapToGrid(rect: PixelRect, type: InteractionType, metrics: GridMetrics): GridRect {
	const { columnWidth, rowHeight, gridColumns, gridRows } = metrics;

	const left = clamp(Math.round(rect.left / columnWidth), 0, gridColumns - 1);
	const top = clamp(Math.round(rect.top / rowHeight), 0, gridRows - 1);
	const width = Math.max(1, Math.round(rect.width / columnWidth));
	const height = Math.max(1, Math.round(rect.height / rowHeight));

	if (type === 'resize') {
		return {
			left,
			top,
			width: Math.min(width, gridColumns - left),
			height: Math.min(height, gridRows - top),
		};
	}

	const movedWidth = Math.min(width, gridColumns);
	const movedHeight = Math.min(height, gridRows);
	return {
		left: left + movedWidth > gridColumns ? gridColumns - movedWidth : left,
		top: top + movedHeight > gridRows ? gridRows - movedHeight : top,
		width: movedWidth,
		height: movedHeight,
	};
}
