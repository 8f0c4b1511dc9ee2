// Layout core
export { resolveLayout } from './algorithm/resolve';
export { resolveOverlaps, reduceUntilFree, REDUCTION_ORDER, type Reduction } from './algorithm/overlap-resolver';
export { findFreeAreas, findLargestFreeArea } from './algorithm/free-areas';
export { balanceFreeAreas, type BalanceOutcome } from './algorithm/area-balancer';
export { placeUnplacedItems } from './algorithm/placer';
export { expandIntoFreeSpace, GROWTH_ORDER, type GrowthDirection } from './algorithm/growth';

// Geometry and occupancy
export {
	findOverlaps,
	formatRect,
	gridRect,
	rectArea,
	rectBottom,
	rectRight,
	rectsEqual,
	rectsOverlap,
	splitRect,
	toPixelRect,
} from './grid-rect';
export { createOccupancyGrid, GridBoundsError, type OccupancyGrid } from './occupancy-grid';

// Headless dashboard controller
export { createDashboard } from './dashboard';
export { createRegistry, handleKey, handlesEqual, type Registry } from './registry';
export { createPositionStore, type PositionReader, type PositionStore } from './position-store';
export {
	createStateMachine,
	isMoving,
	isResizing,
	type EndReason,
	type InteractionContext,
	type InteractionState,
	type InteractionStateMachine,
	type InteractionType,
} from './state-machine';
export { applyMovement, snapToGrid, type GridMetrics } from './interaction';

export type * from './types';
