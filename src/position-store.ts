/**
 * Committed positions, keyed by item handle key.
 *
 * Single writer: only the dashboard controller calls commit()/delete(), at the
 * end of a successful resolution pass. Renderers read and subscribe.
 */

import type { ResolvedPosition } from './types';

export type PositionListener = () => void;

export interface PositionReader {
	get(key: string): ResolvedPosition | undefined;
	entries(): Array<[string, ResolvedPosition]>;
	subscribe(listener: PositionListener): () => void;
}

export interface PositionStore extends PositionReader {
	/** Merge a full arrangement and notify once */
	commit(positions: ReadonlyMap<string, ResolvedPosition>): void;
	delete(key: string): boolean;
}

export function createPositionStore(): PositionStore {
	const positions = new Map<string, ResolvedPosition>();
	const listeners = new Set<PositionListener>();

	function notify(): void {
		for (const listener of Array.from(listeners)) {
			listener();
		}
	}

	return {
		get(key: string): ResolvedPosition | undefined {
			return positions.get(key);
		},

		entries(): Array<[string, ResolvedPosition]> {
			return Array.from(positions);
		},

		subscribe(listener: PositionListener): () => void {
			listeners.add(listener);
			return () => listeners.delete(listener);
		},

		commit(next: ReadonlyMap<string, ResolvedPosition>): void {
			for (const [key, position] of next) {
				positions.set(key, position);
			}
			notify();
		},

		delete(key: string): boolean {
			if (!positions.delete(key)) return false;
			notify();
			return true;
		},
	};
}
