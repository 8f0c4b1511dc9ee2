/**
 * Occupancy grid - which cells of a fixed-size grid are taken.
 *
 * Writes clamp to the grid, reads validate: growth and splitting may hand
 * setRegion() a rectangle that pokes past the right/bottom edge, while a
 * read outside the grid is always a caller bug and throws GridBoundsError.
 */

import { formatRect, rectBottom, rectRight } from './grid-rect';
import type { GridRect } from './types';

export class GridBoundsError extends RangeError {
	readonly rect: GridRect;
	readonly columns: number;
	readonly rows: number;

	constructor(rect: GridRect, columns: number, rows: number, detail: string) {
		super(`Rectangle ${formatRect(rect)} is out of bounds for a ${columns}x${rows} grid: ${detail}`);
		this.name = 'GridBoundsError';
		this.rect = rect;
		this.columns = columns;
		this.rows = rows;
	}
}

export interface OccupancyGrid {
	readonly columns: number;
	readonly rows: number;
	/** Mark every covered cell, clamped to the grid */
	setRegion(rect: GridRect, value: boolean): void;
	/** True iff no covered cell is occupied. Throws GridBoundsError outside the grid. */
	isRegionFree(rect: GridRect): boolean;
	/** Non-throwing bounds test */
	contains(rect: GridRect): boolean;
	/** Throws GridBoundsError unless the rectangle lies inside the grid */
	assertContains(rect: GridRect): void;
	isOccupied(column: number, row: number): boolean;
	countOccupied(): number;
	clone(): OccupancyGrid;
	/** ASCII rendering, `X` = occupied */
	format(): string;
}

function boundsViolation(rect: GridRect, columns: number, rows: number): string | null {
	if (rect.left < 0) return 'left is negative';
	if (rect.top < 0) return 'top is negative';
	if (rect.width < 1) return 'width is below 1';
	if (rect.height < 1) return 'height is below 1';
	if (rectRight(rect) > columns) return 'right edge exceeds columns';
	if (rectBottom(rect) > rows) return 'bottom edge exceeds rows';
	return null;
}

/**
 * Create an empty occupancy grid
 */
export function createOccupancyGrid(columns: number, rows: number): OccupancyGrid {
	if (!Number.isInteger(columns) || columns < 1 || !Number.isInteger(rows) || rows < 1) {
		throw new RangeError(`Grid size must be positive integers, got ${columns}x${rows}`);
	}
	return fromCells(columns, rows, new Array<boolean>(columns * rows).fill(false));
}

// cells[row * columns + column]
function fromCells(columns: number, rows: number, cells: boolean[]): OccupancyGrid {
	return {
		columns,
		rows,

		setRegion(rect: GridRect, value: boolean): void {
			const left = Math.max(0, rect.left);
			const top = Math.max(0, rect.top);
			const right = Math.min(columns, rectRight(rect));
			const bottom = Math.min(rows, rectBottom(rect));
			for (let row = top; row < bottom; row++) {
				for (let column = left; column < right; column++) {
					cells[row * columns + column] = value;
				}
			}
		},

		assertContains(rect: GridRect): void {
			const violation = boundsViolation(rect, columns, rows);
			if (violation) {
				throw new GridBoundsError(rect, columns, rows, violation);
			}
		},

		isRegionFree(rect: GridRect): boolean {
			this.assertContains(rect);
			const right = rectRight(rect);
			const bottom = rectBottom(rect);
			for (let row = rect.top; row < bottom; row++) {
				for (let column = rect.left; column < right; column++) {
					if (cells[row * columns + column]) return false;
				}
			}
			return true;
		},

		contains(rect: GridRect): boolean {
			return boundsViolation(rect, columns, rows) === null;
		},

		isOccupied(column: number, row: number): boolean {
			if (column < 0 || column >= columns || row < 0 || row >= rows) {
				throw new GridBoundsError({ left: column, top: row, width: 1, height: 1 }, columns, rows, 'cell outside grid');
			}
			return cells[row * columns + column];
		},

		countOccupied(): number {
			return cells.filter(Boolean).length;
		},

		clone(): OccupancyGrid {
			return fromCells(columns, rows, cells.slice());
		},

		format(): string {
			const lines: string[] = [];
			for (let row = 0; row < rows; row++) {
				let line = '';
				for (let column = 0; column < columns; column++) {
					line += cells[row * columns + column] ? 'X' : '.';
				}
				lines.push(`${row.toString().padStart(2)}: ${line}`);
			}
			return lines.join('\n');
		},
	};
}
