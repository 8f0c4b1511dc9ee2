/**
 * Area supply balancing - makes sure there is one free area per unplaced item.
 *
 * Free areas are halved first. Once only single cells (or nothing) remain,
 * the largest placed movable item gives up half of itself instead.
 */

import { indexOfLargest, isSingleCell, rectArea, splitRect } from '../grid-rect';
import type { OccupancyGrid } from '../occupancy-grid';
import type { ArrangementFailure, GridRect } from '../types';
import { requirePosition } from './overlap-resolver';

export interface BalanceOutcome {
	/** False when the loop stopped early because the best donor was a single cell */
	balanced: boolean;
}

/**
 * Largest placed movable item (first in enumeration order wins ties)
 */
function findDonor<T>(
	movable: readonly T[],
	unplaced: ReadonlySet<T>,
	positions: ReadonlyMap<T, GridRect>,
): T | undefined {
	let donor: T | undefined;
	let donorArea = -1;
	for (const item of movable) {
		if (unplaced.has(item)) continue;
		const area = rectArea(requirePosition(positions, item));
		if (area > donorArea) {
			donor = item;
			donorArea = area;
		}
	}
	return donor;
}

/**
 * Split free areas, then placed movable items, until
 * `freeAreas.length >= unplaced.length`. Mutates `freeAreas`, `positions`
 * and `grid`.
 *
 * Stopping at a single-cell donor is not a failure here; the placer fails
 * afterwards if it is still short.
 */
export function balanceFreeAreas<T>(
	grid: OccupancyGrid,
	freeAreas: GridRect[],
	movable: readonly T[],
	unplaced: readonly T[],
	positions: Map<T, GridRect>,
): BalanceOutcome | ArrangementFailure {
	const unplacedSet = new Set(unplaced);

	while (freeAreas.length < unplaced.length) {
		const largestIndex = indexOfLargest(freeAreas);
		if (largestIndex !== -1 && !isSingleCell(freeAreas[largestIndex])) {
			const [larger, smaller] = splitRect(freeAreas[largestIndex]);
			freeAreas.splice(largestIndex, 1);
			freeAreas.push(larger, smaller);
			continue;
		}

		const donor = findDonor(movable, unplacedSet, positions);
		if (donor === undefined) {
			return {
				success: false,
				reason: 'no-splittable-item',
				message: `No placed movable item can be split to make room for ${unplaced.length} unplaced item(s)`,
			};
		}

		const position = requirePosition(positions, donor);
		if (isSingleCell(position)) {
			return { balanced: false };
		}

		const [kept, freed] = splitRect(position);
		grid.setRegion(position, false);
		positions.set(donor, kept);
		grid.setRegion(kept, true);
		freeAreas.push(freed);
	}

	return { balanced: true };
}
