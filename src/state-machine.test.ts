/**
 * Tests for the interaction state machine
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
	createInitialState,
	createStateMachine,
	isMoving,
	isResizing,
	reducer,
	type InteractionContext,
	type InteractionStateMachine,
} from './state-machine';

// ============================================================================
// Test Helpers
// ============================================================================

function createContext(type: 'move' | 'resize'): Omit<InteractionContext, 'lastTarget'> {
	return {
		type,
		item: { index: 0, generation: 1 },
		itemKey: '0:1',
		startRect: { left: 1, top: 1, width: 2, height: 2 },
	};
}

// ============================================================================
// Reducer
// ============================================================================

describe('reducer', () => {
	it('starts in idle', () => {
		expect(createInitialState()).toEqual({ phase: 'idle', interaction: null, lastEndReason: null });
	});

	it('seeds lastTarget with the start rectangle', () => {
		const state = reducer(createInitialState(), { type: 'START_INTERACTION', context: createContext('move') });
		expect(state.phase).toBe('interacting');
		expect(state.interaction?.lastTarget).toEqual({ left: 1, top: 1, width: 2, height: 2 });
	});

	it('ignores a start while already interacting', () => {
		const started = reducer(createInitialState(), { type: 'START_INTERACTION', context: createContext('move') });
		const next = reducer(started, { type: 'START_INTERACTION', context: createContext('resize') });
		expect(next).toBe(started);
	});

	it('updates the target without touching the start rectangle', () => {
		const started = reducer(createInitialState(), { type: 'START_INTERACTION', context: createContext('move') });
		const target = { left: 2, top: 1, width: 2, height: 2 };
		const next = reducer(started, { type: 'UPDATE_INTERACTION', target });
		expect(next.interaction?.lastTarget).toEqual(target);
		expect(next.interaction?.startRect).toEqual({ left: 1, top: 1, width: 2, height: 2 });
	});

	it('ignores updates and ends while idle', () => {
		const idle = createInitialState();
		expect(reducer(idle, { type: 'UPDATE_INTERACTION', target: { left: 0, top: 0, width: 1, height: 1 } })).toBe(idle);
		expect(reducer(idle, { type: 'END_INTERACTION', reason: 'pointer-up' })).toBe(idle);
	});

	it('records why the interaction ended', () => {
		const started = reducer(createInitialState(), { type: 'START_INTERACTION', context: createContext('resize') });
		expect(reducer(started, { type: 'END_INTERACTION', reason: 'pointer-leave' })).toEqual({
			phase: 'idle',
			interaction: null,
			lastEndReason: 'pointer-leave',
		});
	});
});

// ============================================================================
// State Machine Instance
// ============================================================================

describe('createStateMachine', () => {
	let machine: InteractionStateMachine;

	beforeEach(() => {
		machine = createStateMachine();
	});

	it('notifies listeners on real transitions only', () => {
		const listener = vi.fn();
		machine.subscribe(listener);

		machine.transition({ type: 'END_INTERACTION', reason: 'pointer-up' });
		expect(listener).not.toHaveBeenCalled();

		const action = { type: 'START_INTERACTION', context: createContext('move') } as const;
		machine.transition(action);
		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(machine.getState(), action);
	});

	it('stops notifying after unsubscribe', () => {
		const listener = vi.fn();
		const unsubscribe = machine.subscribe(listener);
		unsubscribe();
		machine.transition({ type: 'START_INTERACTION', context: createContext('move') });
		expect(listener).not.toHaveBeenCalled();
	});

	it('reports the interaction type', () => {
		machine.transition({ type: 'START_INTERACTION', context: createContext('resize') });
		expect(isResizing(machine.getState())).toBe(true);
		expect(isMoving(machine.getState())).toBe(false);

		machine.transition({ type: 'END_INTERACTION', reason: 'superseded' });
		expect(isResizing(machine.getState())).toBe(false);
	});

	it('accepts an initial state', () => {
		const started = reducer(createInitialState(), { type: 'START_INTERACTION', context: createContext('move') });
		expect(isMoving(createStateMachine(started).getState())).toBe(true);
	});
});
