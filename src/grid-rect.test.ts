import { describe, expect, it } from 'vitest';
import {
	findOverlaps,
	formatRect,
	gridRect,
	halveLarge,
	halveSmall,
	indexOfLargest,
	rectArea,
	rectBottom,
	rectRight,
	rectsEqual,
	rectsOverlap,
	splitRect,
	toPixelRect,
} from './grid-rect';

describe('derived values', () => {
	it('computes right, bottom and area', () => {
		const rect = gridRect(1, 2, 3, 4);
		expect(rectRight(rect)).toBe(4);
		expect(rectBottom(rect)).toBe(6);
		expect(rectArea(rect)).toBe(12);
	});

	it('compares by value', () => {
		expect(rectsEqual(gridRect(1, 1, 2, 2), { left: 1, top: 1, width: 2, height: 2 })).toBe(true);
		expect(rectsEqual(gridRect(1, 1, 2, 2), gridRect(1, 1, 2, 3))).toBe(false);
	});

	it('formats for log output', () => {
		expect(formatRect(gridRect(0, 3, 2, 1))).toBe('(0, 3, 2x1)');
	});
});

describe('rectsOverlap', () => {
	it('treats touching edges as non-overlapping', () => {
		expect(rectsOverlap(gridRect(0, 0, 2, 2), gridRect(2, 0, 2, 2))).toBe(false);
		expect(rectsOverlap(gridRect(0, 0, 2, 2), gridRect(0, 2, 2, 2))).toBe(false);
	});

	it('detects partial and full containment', () => {
		expect(rectsOverlap(gridRect(0, 0, 2, 2), gridRect(1, 1, 2, 2))).toBe(true);
		expect(rectsOverlap(gridRect(0, 0, 4, 4), gridRect(1, 1, 1, 1))).toBe(true);
	});

	it('lists overlapping index pairs', () => {
		const rects = [gridRect(0, 0, 2, 2), gridRect(1, 1, 2, 2), gridRect(5, 5, 1, 1), gridRect(2, 2, 1, 1)];
		expect(findOverlaps(rects)).toEqual([[0, 1], [1, 3]]);
	});
});

describe('splitting', () => {
	it('halves into ceil and floor parts', () => {
		expect(halveLarge(5)).toBe(3);
		expect(halveSmall(5)).toBe(2);
		expect(halveLarge(4)).toBe(2);
		expect(halveSmall(4)).toBe(2);
	});

	it('splits along the wider axis', () => {
		expect(splitRect(gridRect(0, 0, 5, 2))).toEqual([gridRect(0, 0, 3, 2), gridRect(3, 0, 2, 2)]);
	});

	it('splits along the taller axis', () => {
		expect(splitRect(gridRect(1, 2, 2, 3))).toEqual([gridRect(1, 2, 2, 2), gridRect(1, 4, 2, 1)]);
	});

	it('prefers width when both sides are equal', () => {
		expect(splitRect(gridRect(0, 0, 2, 2))).toEqual([gridRect(0, 0, 1, 2), gridRect(1, 0, 1, 2)]);
	});

	it('never overlaps the two parts', () => {
		const [a, b] = splitRect(gridRect(3, 1, 7, 3));
		expect(rectsOverlap(a, b)).toBe(false);
		expect(rectArea(a) + rectArea(b)).toBe(21);
	});
});

describe('indexOfLargest', () => {
	it('returns the first of equally large rectangles', () => {
		expect(indexOfLargest([gridRect(0, 0, 1, 1), gridRect(0, 0, 2, 1), gridRect(5, 5, 1, 2)])).toBe(1);
	});

	it('returns -1 for no rectangles', () => {
		expect(indexOfLargest([])).toBe(-1);
	});
});

describe('toPixelRect', () => {
	it('scales by column width and row height', () => {
		expect(toPixelRect(gridRect(1, 2, 3, 4), 10, 20)).toEqual({ left: 10, top: 40, width: 30, height: 80 });
	});
});
