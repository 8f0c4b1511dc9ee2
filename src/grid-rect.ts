/**
 * Grid rectangle helpers - pure value functions, no state.
 */

import type { GridRect, PixelRect } from './types';

export function gridRect(left: number, top: number, width: number, height: number): GridRect {
	return { left, top, width, height };
}

export function rectRight(rect: GridRect): number {
	return rect.left + rect.width;
}

export function rectBottom(rect: GridRect): number {
	return rect.top + rect.height;
}

export function rectArea(rect: GridRect): number {
	return rect.width * rect.height;
}

export function isSingleCell(rect: GridRect): boolean {
	return rect.width === 1 && rect.height === 1;
}

export function rectsEqual(a: GridRect, b: GridRect): boolean {
	return a.left === b.left && a.top === b.top && a.width === b.width && a.height === b.height;
}

/**
 * Check if two rectangles share at least one cell
 */
export function rectsOverlap(a: GridRect, b: GridRect): boolean {
	return !(
		rectRight(a) <= b.left ||
		rectRight(b) <= a.left ||
		rectBottom(a) <= b.top ||
		rectBottom(b) <= a.top
	);
}

/**
 * Find every overlapping pair
 * @returns Index pairs into `rects`, empty if no overlaps
 */
export function findOverlaps(rects: readonly GridRect[]): Array<[number, number]> {
	const overlaps: Array<[number, number]> = [];
	for (let i = 0; i < rects.length; i++) {
		for (let j = i + 1; j < rects.length; j++) {
			if (rectsOverlap(rects[i], rects[j])) {
				overlaps.push([i, j]);
			}
		}
	}
	return overlaps;
}

/** ceil(value / 2) */
export function halveLarge(value: number): number {
	return value - Math.floor(value / 2);
}

/** floor(value / 2) */
export function halveSmall(value: number): number {
	return Math.floor(value / 2);
}

/**
 * Split a rectangle in two along its longer axis (width wins ties).
 *
 * The first part keeps the origin and the larger half, the second part
 * covers the remaining cells.
 */
export function splitRect(rect: GridRect): [GridRect, GridRect] {
	if (rect.width >= rect.height) {
		const kept = halveLarge(rect.width);
		return [
			{ ...rect, width: kept },
			{ ...rect, left: rect.left + kept, width: halveSmall(rect.width) },
		];
	}
	const kept = halveLarge(rect.height);
	return [
		{ ...rect, height: kept },
		{ ...rect, top: rect.top + kept, height: halveSmall(rect.height) },
	];
}

/**
 * Index of the rectangle with the largest area, first one wins ties.
 * Returns -1 for an empty list.
 */
export function indexOfLargest(rects: readonly GridRect[]): number {
	let best = -1;
	for (let i = 0; i < rects.length; i++) {
		if (best === -1 || rectArea(rects[i]) > rectArea(rects[best])) {
			best = i;
		}
	}
	return best;
}

export function toPixelRect(rect: GridRect, columnWidth: number, rowHeight: number): PixelRect {
	return {
		left: rect.left * columnWidth,
		top: rect.top * rowHeight,
		width: rect.width * columnWidth,
		height: rect.height * rowHeight,
	};
}

export function formatRect(rect: GridRect): string {
	return `(${rect.left}, ${rect.top}, ${rect.width}x${rect.height})`;
}
