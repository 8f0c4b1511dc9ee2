import { indexOfLargest } from '../grid-rect';
import type { OccupancyGrid } from '../occupancy-grid';
import type { ArrangementFailure, GridRect } from '../types';

/**
 * Give each unplaced item (in discovery order) the largest remaining free
 * area. Consumed areas are removed from `freeAreas` and occupied in `grid`.
 */
export function placeUnplacedItems<T>(
	grid: OccupancyGrid,
	freeAreas: GridRect[],
	unplaced: readonly T[],
	positions: Map<T, GridRect>,
): ArrangementFailure | null {
	for (let i = 0; i < unplaced.length; i++) {
		const largestIndex = indexOfLargest(freeAreas);
		if (largestIndex === -1) {
			return {
				success: false,
				reason: 'insufficient-free-area',
				message: `Ran out of free areas after placing ${i} of ${unplaced.length} unplaced item(s)`,
			};
		}
		const [area] = freeAreas.splice(largestIndex, 1);
		positions.set(unplaced[i], area);
		grid.setRegion(area, true);
	}
	return null;
}
