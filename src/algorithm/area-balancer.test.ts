import { describe, expect, it } from 'vitest';
import { gridRect } from '../grid-rect';
import { createOccupancyGrid } from '../occupancy-grid';
import type { GridRect } from '../types';
import { balanceFreeAreas } from './area-balancer';

type Item = { name: string };

describe('balanceFreeAreas', () => {
	it('does nothing when supply already matches demand', () => {
		const grid = createOccupancyGrid(2, 1);
		const item = { name: 'item' };
		const freeAreas = [gridRect(0, 0, 2, 1)];
		const outcome = balanceFreeAreas(grid, freeAreas, [item], [item], new Map([[item, gridRect(0, 0, 1, 1)]]));
		expect(outcome).toEqual({ balanced: true });
		expect(freeAreas).toEqual([gridRect(0, 0, 2, 1)]);
	});

	it('splits the largest free area first', () => {
		const grid = createOccupancyGrid(4, 1);
		const a = { name: 'a' };
		const b = { name: 'b' };
		const positions = new Map<Item, GridRect>([
			[a, gridRect(0, 0, 1, 1)],
			[b, gridRect(0, 0, 1, 1)],
		]);
		const freeAreas = [gridRect(0, 0, 4, 1)];

		expect(balanceFreeAreas(grid, freeAreas, [a, b], [a, b], positions)).toEqual({ balanced: true });
		expect(freeAreas).toEqual([gridRect(0, 0, 2, 1), gridRect(2, 0, 2, 1)]);
	});

	it('splits a placed item once free areas are single cells', () => {
		const grid = createOccupancyGrid(2, 2);
		const placed = { name: 'placed' };
		const a = { name: 'a' };
		const b = { name: 'b' };
		grid.setRegion(gridRect(0, 0, 2, 2), true);
		const positions = new Map<Item, GridRect>([
			[placed, gridRect(0, 0, 2, 2)],
			[a, gridRect(0, 0, 1, 1)],
			[b, gridRect(0, 0, 1, 1)],
		]);
		const freeAreas: GridRect[] = [];

		const outcome = balanceFreeAreas(grid, freeAreas, [placed, a, b], [a, b], positions);

		expect(outcome).toEqual({ balanced: true });
		expect(positions.get(placed)).toEqual(gridRect(0, 0, 1, 2));
		// The freed column (1,0,1,2) was then split into two cells
		expect(freeAreas).toEqual([gridRect(1, 0, 1, 1), gridRect(1, 1, 1, 1)]);
		expect(grid.format()).toBe(' 0: X.\n 1: X.');
	});

	it('picks the largest placed item as donor', () => {
		const grid = createOccupancyGrid(3, 2);
		const small = { name: 'small' };
		const large = { name: 'large' };
		const waiting = { name: 'waiting' };
		grid.setRegion(gridRect(0, 0, 3, 2), true);
		const positions = new Map<Item, GridRect>([
			[small, gridRect(0, 0, 1, 2)],
			[large, gridRect(1, 0, 2, 2)],
			[waiting, gridRect(0, 0, 1, 1)],
		]);
		const freeAreas: GridRect[] = [];

		balanceFreeAreas(grid, freeAreas, [small, large, waiting], [waiting], positions);

		expect(positions.get(small)).toEqual(gridRect(0, 0, 1, 2));
		expect(positions.get(large)).toEqual(gridRect(1, 0, 1, 2));
		expect(freeAreas).toEqual([gridRect(2, 0, 1, 2)]);
	});

	it('fails when no placed movable item exists', () => {
		const grid = createOccupancyGrid(1, 1);
		const item = { name: 'item' };
		const outcome = balanceFreeAreas(grid, [], [item], [item], new Map([[item, gridRect(0, 0, 1, 1)]]));
		expect(outcome).toEqual({
			success: false,
			reason: 'no-splittable-item',
			message: 'No placed movable item can be split to make room for 1 unplaced item(s)',
		});
	});

	it('stops early when the donor is a single cell', () => {
		const grid = createOccupancyGrid(1, 2);
		const placed = { name: 'placed' };
		const a = { name: 'a' };
		const b = { name: 'b' };
		grid.setRegion(gridRect(0, 0, 1, 1), true);
		const positions = new Map<Item, GridRect>([
			[placed, gridRect(0, 0, 1, 1)],
			[a, gridRect(0, 0, 1, 1)],
			[b, gridRect(0, 0, 1, 1)],
		]);
		const freeAreas = [gridRect(0, 1, 1, 1)];

		expect(balanceFreeAreas(grid, freeAreas, [placed, a, b], [a, b], positions)).toEqual({ balanced: false });
		expect(freeAreas).toEqual([gridRect(0, 1, 1, 1)]);
		expect(positions.get(placed)).toEqual(gridRect(0, 0, 1, 1));
	});
});
