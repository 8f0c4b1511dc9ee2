/**
 * Item registry with generation-checked handles.
 *
 * Slots are reused after unregister; every reuse bumps the slot's
 * generation, so a handle kept by a removed item resolves to nothing
 * instead of aliasing whichever item took its slot.
 */

import type { ItemHandle } from './types';

export interface Registry<T> {
	readonly size: number;
	/** `create` receives the new handle so the value can refer to it */
	register(create: (handle: ItemHandle) => T): ItemHandle;
	unregister(handle: ItemHandle): boolean;
	get(handle: ItemHandle): T | undefined;
	has(handle: ItemHandle): boolean;
	/** Live entries in registration order */
	entries(): Array<[ItemHandle, T]>;
}

interface Slot {
	generation: number;
	occupied: boolean;
}

export function handleKey(handle: ItemHandle): string {
	return `${handle.index}:${handle.generation}`;
}

export function handlesEqual(a: ItemHandle, b: ItemHandle): boolean {
	return a.index === b.index && a.generation === b.generation;
}

export function createRegistry<T>(): Registry<T> {
	const slots: Slot[] = [];
	const freeSlots: number[] = [];
	// Map keeps insertion order, which is the layout enumeration order
	const live = new Map<number, { handle: ItemHandle; value: T }>();

	function isLive(handle: ItemHandle): boolean {
		const slot = slots[handle.index];
		return slot !== undefined && slot.occupied && slot.generation === handle.generation;
	}

	return {
		get size() {
			return live.size;
		},

		register(create: (handle: ItemHandle) => T): ItemHandle {
			let index = freeSlots.shift();
			if (index === undefined) {
				index = slots.length;
				slots.push({ generation: 0, occupied: false });
			}
			const slot = slots[index];
			slot.generation++;
			slot.occupied = true;
			const handle: ItemHandle = { index, generation: slot.generation };
			live.set(index, { handle, value: create(handle) });
			return handle;
		},

		unregister(handle: ItemHandle): boolean {
			if (!isLive(handle)) return false;
			slots[handle.index].occupied = false;
			live.delete(handle.index);
			freeSlots.push(handle.index);
			return true;
		},

		get(handle: ItemHandle): T | undefined {
			return isLive(handle) ? live.get(handle.index)?.value : undefined;
		},

		has(handle: ItemHandle): boolean {
			return isLive(handle);
		},

		entries(): Array<[ItemHandle, T]> {
			return Array.from(live.values(), (entry) => [entry.handle, entry.value]);
		},
	};
}
