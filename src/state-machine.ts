/**
 * Interaction State Machine
 *
 * Single source of truth for which item is being moved or resized.
 *
 * Key invariants:
 * 1. Only ONE interaction can be active at a time (move OR resize, not both)
 * 2. The start rectangle is captured at interaction start and never changes
 * 3. Phases: idle → interacting → idle
 */

import type { GridRect, ItemHandle } from './types';

// ============================================================================
// State Types
// ============================================================================

export type InteractionType = 'move' | 'resize';

export type InteractionPhase = 'idle' | 'interacting';

export type EndReason =
	| 'pointer-up'
	| 'pointer-leave'
	| 'superseded';  // Another interaction was started

export interface InteractionContext {
	type: InteractionType;
	/** The item being interacted with */
	item: ItemHandle;
	/** handleKey() of `item` */
	itemKey: string;
	/** Grid position at interaction start */
	startRect: GridRect;
	/** Last target rectangle that resolved successfully */
	lastTarget: GridRect;
}

export interface InteractionState {
	phase: InteractionPhase;
	interaction: InteractionContext | null;
	lastEndReason: EndReason | null;
}

// ============================================================================
// State Machine
// ============================================================================

export type StateTransition =
	| { type: 'START_INTERACTION'; context: Omit<InteractionContext, 'lastTarget'> }
	| { type: 'UPDATE_INTERACTION'; target: GridRect }
	| { type: 'END_INTERACTION'; reason: EndReason };

export type StateListener = (state: InteractionState, transition: StateTransition) => void;

export interface InteractionStateMachine {
	getState(): InteractionState;
	transition(action: StateTransition): InteractionState;
	subscribe(listener: StateListener): () => void;
}

export function createInitialState(): InteractionState {
	return {
		phase: 'idle',
		interaction: null,
		lastEndReason: null,
	};
}

/**
 * Pure state reducer - computes next state from current state and action
 */
export function reducer(state: InteractionState, action: StateTransition): InteractionState {
	switch (action.type) {
		case 'START_INTERACTION': {
			if (state.phase !== 'idle') {
				return state;
			}
			return {
				...state,
				phase: 'interacting',
				interaction: { ...action.context, lastTarget: action.context.startRect },
			};
		}

		case 'UPDATE_INTERACTION': {
			if (state.phase !== 'interacting' || !state.interaction) {
				return state;
			}
			return {
				...state,
				interaction: { ...state.interaction, lastTarget: action.target },
			};
		}

		case 'END_INTERACTION': {
			if (state.phase !== 'interacting') {
				return state;
			}
			return {
				phase: 'idle',
				interaction: null,
				lastEndReason: action.reason,
			};
		}

		default:
			return state;
	}
}

/**
 * Create a state machine instance
 */
export function createStateMachine(initialState?: InteractionState): InteractionStateMachine {
	let state = initialState ?? createInitialState();
	const listeners = new Set<StateListener>();

	return {
		getState() {
			return state;
		},

		transition(action: StateTransition) {
			const nextState = reducer(state, action);
			if (nextState !== state) {
				state = nextState;
				for (const listener of listeners) {
					listener(state, action);
				}
			}
			return state;
		},

		subscribe(listener: StateListener) {
			listeners.add(listener);
			return () => listeners.delete(listener);
		},
	};
}

export function isMoving(state: InteractionState): boolean {
	return state.phase === 'interacting' && state.interaction?.type === 'move';
}

export function isResizing(state: InteractionState): boolean {
	return state.phase === 'interacting' && state.interaction?.type === 'resize';
}
