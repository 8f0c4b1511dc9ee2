import type { InteractionStateMachine } from './state-machine';

/**
 * Rectangle in integer grid cells. `left`/`top` are 0-indexed.
 */
export interface GridRect {
	left: number;
	top: number;
	width: number;
	height: number;
}

/**
 * Rectangle in pixels (or any device unit), derived from a GridRect
 * by scaling with the column width and row height.
 */
export interface PixelRect {
	left: number;
	top: number;
	width: number;
	height: number;
}

export interface ResolvedPosition {
	grid: GridRect;
	pixel: PixelRect;
}

// ============================================================================
// Resolution Types
// ============================================================================

export type ArrangementFailureReason =
	| 'no-splittable-item'  // Balancer found no placed movable item to split
	| 'insufficient-free-area';  // Placer ran out of free areas

export interface ArrangementFailure {
	success: false;
	reason: ArrangementFailureReason;
	message: string;
}

export interface ArrangementSuccess<T> {
	success: true;
	positions: Map<T, ResolvedPosition>;
}

export type ResolveResult<T> = ArrangementSuccess<T> | ArrangementFailure;

/**
 * Input for a single resolution pass.
 *
 * Item identity is by reference: the same object must be used for
 * `sticky`/`movable` and for keys of the returned positions.
 */
export interface ResolveInput<T> {
	/** Items that occupy space but are never moved */
	sticky: readonly T[];
	/** Items that may be shrunk, moved or grown. Order is significant. */
	movable: readonly T[];
	columnWidth: number;
	rowHeight: number;
	gridColumns: number;
	gridRows: number;
	/**
	 * Desired grid rectangle per item. For the active item this is the
	 * drag/resize target, for every other item its current position.
	 */
	getPosition(item: T): GridRect;
	/** Log stage transitions and occupancy to console.debug */
	debug?: boolean;
}

// ============================================================================
// Dashboard Types
// ============================================================================

/**
 * Generation-checked reference to a registered item
 */
export interface ItemHandle {
	readonly index: number;
	readonly generation: number;
}

export interface DashboardItemInit {
	/**
	 * Stored and published as given. Overlaps with existing items are not
	 * checked here; the next pointerMove() pass separates them.
	 */
	position: GridRect;
	/** Locked items are never moved by the layout algorithm (default: false) */
	locked?: boolean;
}

export interface DashboardItem {
	readonly handle: ItemHandle;
	readonly locked: boolean;
	readonly position: GridRect;
	readonly pixel: PixelRect;
}

export interface DashboardOptions {
	/** Number of grid columns (default: 12) */
	gridColumns?: number;
	/** Number of grid rows (default: 12) */
	gridRows?: number;
	/** Width of the dashboard surface in pixels */
	width: number;
	/** Height of the dashboard surface in pixels */
	height: number;
	/** Log every resolution pass to console.debug (default: false) */
	debug?: boolean;
}

export type DashboardListener = (items: DashboardItem[]) => void;

export interface Dashboard {
	readonly gridColumns: number;
	readonly gridRows: number;
	/** Read-only view of the interaction lifecycle */
	readonly interactions: Pick<InteractionStateMachine, 'getState' | 'subscribe'>;
	/** Throws GridBoundsError when the position leaves the grid */
	addItem(init: DashboardItemInit): ItemHandle;
	removeItem(handle: ItemHandle): boolean;
	getItem(handle: ItemHandle): DashboardItem | undefined;
	getItems(): DashboardItem[];
	/** Update surface size and recompute pixel rectangles */
	setBounds(width: number, height: number): void;
	beginMove(handle: ItemHandle): boolean;
	beginResize(handle: ItemHandle): boolean;
	/**
	 * Apply a pointer movement delta to the active interaction and run one
	 * resolution pass. Returns true when a new arrangement was committed.
	 */
	pointerMove(movementX: number, movementY: number): boolean;
	pointerUp(): void;
	pointerLeave(): void;
	subscribe(listener: DashboardListener): () => void;
	destroy(): void;
}
