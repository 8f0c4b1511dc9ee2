import { resolveLayout } from './algorithm/resolve';
import { rectsOverlap, toPixelRect } from './grid-rect';
import { applyMovement, snapToGrid, type GridMetrics } from './interaction';
import { createOccupancyGrid } from './occupancy-grid';
import { createPositionStore } from './position-store';
import { createRegistry, handleKey } from './registry';
import { createStateMachine, type EndReason, type InteractionType } from './state-machine';
import type {
	Dashboard,
	DashboardItem,
	DashboardItemInit,
	DashboardListener,
	DashboardOptions,
	GridRect,
	ItemHandle,
	PixelRect,
	ResolvedPosition,
} from './types';

/** Registry value; its object identity is the item identity seen by the resolver */
interface ItemRecord {
	key: string;
	handle: ItemHandle;
	locked: boolean;
}

/**
 * Create a headless dashboard controller.
 *
 * Owns item registration, committed positions and the move/resize
 * interaction. The caller feeds it pointer movement deltas and renders
 * whatever it publishes through subscribe().
 *
 * @param options - Grid size, surface size in pixels and debug flag
 */
export function createDashboard(options: DashboardOptions): Dashboard {
	const {
		gridColumns = 12,
		gridRows = 12,
		debug = false,
	} = options;

	// Only used for bounds validation of caller-supplied positions
	const gridBounds = createOccupancyGrid(gridColumns, gridRows);
	const registry = createRegistry<ItemRecord>();
	const store = createPositionStore();
	const stateMachine = createStateMachine();
	const cleanups: (() => void)[] = [];

	let metrics = computeMetrics(options.width, options.height);
	// Accumulated pointer position of the active item, in pixels
	let activePixelRect: PixelRect | null = null;

	/** Register an unsubscriber for destroy(); calling the returned function also forgets it */
	function track(unsubscribe: () => void): () => void {
		const cleanup = () => {
			unsubscribe();
			const index = cleanups.indexOf(cleanup);
			if (index !== -1) cleanups.splice(index, 1);
		};
		cleanups.push(cleanup);
		return cleanup;
	}

	function computeMetrics(width: number, height: number): GridMetrics {
		if (width <= 0 || height <= 0) {
			console.warn(`[cellboard] Dashboard width or height is 0 (${width}x${height}).`);
		}
		return {
			columnWidth: Math.max(width, 1) / gridColumns,
			rowHeight: Math.max(height, 1) / gridRows,
			gridColumns,
			gridRows,
		};
	}

	function resolved(position: GridRect): ResolvedPosition {
		return { grid: position, pixel: toPixelRect(position, metrics.columnWidth, metrics.rowHeight) };
	}

	function requireGrid(record: ItemRecord): GridRect {
		const position = store.get(record.key);
		if (!position) {
			throw new Error(`[cellboard] No position stored for item ${record.key}`);
		}
		return position.grid;
	}

	function toItem(record: ItemRecord): DashboardItem | undefined {
		const position = store.get(record.key);
		if (!position) return undefined;
		return {
			handle: record.handle,
			locked: record.locked,
			position: position.grid,
			pixel: position.pixel,
		};
	}

	function getItems(): DashboardItem[] {
		const items: DashboardItem[] = [];
		for (const [, record] of registry.entries()) {
			const item = toItem(record);
			if (item) items.push(item);
		}
		return items;
	}

	function endInteraction(reason: EndReason): void {
		stateMachine.transition({ type: 'END_INTERACTION', reason });
		activePixelRect = null;
	}

	function beginInteraction(handle: ItemHandle, type: InteractionType): boolean {
		const record = registry.get(handle);
		if (!record) {
			console.warn(`[cellboard] begin ${type}: item ${handleKey(handle)} is not registered`);
			return false;
		}
		if (record.locked) {
			console.warn(`[cellboard] begin ${type}: item ${record.key} is locked`);
			return false;
		}

		if (stateMachine.getState().phase === 'interacting') {
			endInteraction('superseded');
		}

		const position = store.get(record.key);
		if (!position) return false;
		stateMachine.transition({
			type: 'START_INTERACTION',
			context: {
				type,
				item: handle,
				itemKey: record.key,
				startRect: position.grid,
			},
		});
		activePixelRect = position.pixel;
		return true;
	}

	function pointerMove(movementX: number, movementY: number): boolean {
		const { interaction } = stateMachine.getState();
		if (!interaction || !activePixelRect) return false;

		const active = registry.get(interaction.item);
		if (!active) {
			endInteraction('superseded');
			return false;
		}

		activePixelRect = applyMovement(activePixelRect, interaction.type, movementX, movementY);
		const target = snapToGrid(activePixelRect, interaction.type, metrics);

		// Snapshot for this pass
		const others = registry.entries().map(([, record]) => record).filter((record) => record !== active);
		const locked = others.filter((record) => record.locked);
		const free = others.filter((record) => !record.locked);

		// The active item holds its target and everything else makes room,
		// unless the target sits on a locked item; then it has to yield too
		const blockedByLocked = locked.some((record) => rectsOverlap(requireGrid(record), target));
		const sticky = blockedByLocked ? locked : [...locked, active];
		const movable = blockedByLocked ? [active, ...free] : free;

		const result = resolveLayout({
			sticky,
			movable,
			columnWidth: metrics.columnWidth,
			rowHeight: metrics.rowHeight,
			gridColumns,
			gridRows,
			getPosition: (record) => (record === active ? target : requireGrid(record)),
			debug,
		});

		if (!result.success) {
			if (debug) {
				console.debug(`[cellboard] keeping previous layout: ${result.message}`);
			}
			return false;
		}

		const committed = new Map<string, ResolvedPosition>();
		for (const [record, position] of result.positions) {
			committed.set(record.key, position);
		}
		store.commit(committed);
		stateMachine.transition({ type: 'UPDATE_INTERACTION', target });
		return true;
	}

	return {
		gridColumns,
		gridRows,
		interactions: {
			getState: () => stateMachine.getState(),
			subscribe: (listener) => track(stateMachine.subscribe(listener)),
		},

		addItem(init: DashboardItemInit): ItemHandle {
			gridBounds.assertContains(init.position);
			const handle = registry.register((registered) => ({
				key: handleKey(registered),
				handle: registered,
				locked: init.locked ?? false,
			}));
			store.commit(new Map([[handleKey(handle), resolved({ ...init.position })]]));
			return handle;
		},

		removeItem(handle: ItemHandle): boolean {
			const record = registry.get(handle);
			if (!record || !registry.unregister(handle)) return false;
			if (stateMachine.getState().interaction?.itemKey === record.key) {
				endInteraction('superseded');
			}
			store.delete(record.key);
			return true;
		},

		getItem(handle: ItemHandle): DashboardItem | undefined {
			const record = registry.get(handle);
			return record ? toItem(record) : undefined;
		},

		getItems,

		setBounds(width: number, height: number): void {
			metrics = computeMetrics(width, height);
			const rescaled = new Map<string, ResolvedPosition>();
			for (const [key, position] of store.entries()) {
				rescaled.set(key, resolved(position.grid));
			}
			store.commit(rescaled);

			const { interaction } = stateMachine.getState();
			if (interaction) {
				activePixelRect = resolved(interaction.lastTarget).pixel;
			}
		},

		beginMove(handle: ItemHandle): boolean {
			return beginInteraction(handle, 'move');
		},

		beginResize(handle: ItemHandle): boolean {
			return beginInteraction(handle, 'resize');
		},

		pointerMove,

		pointerUp(): void {
			endInteraction('pointer-up');
		},

		pointerLeave(): void {
			endInteraction('pointer-leave');
		},

		subscribe(listener: DashboardListener): () => void {
			return track(store.subscribe(() => listener(getItems())));
		},

		destroy(): void {
			endInteraction('superseded');
			for (const cleanup of cleanups.splice(0)) {
				cleanup();
			}
		},
	};
}
