/**
 * Game Lifecycle
 *
 * Maps the remote API's game/schedule states onto the local lifecycle:
 *
 *   SCHEDULED -> LIVE -> FINAL
 *   SCHEDULED | LIVE -> POSTPONED | CANCELLED
 *
 * Transitions are never inferred locally; every state comes from a fetch.
 */

export const GAME_STATES = ['SCHEDULED', 'LIVE', 'FINAL', 'POSTPONED', 'CANCELLED'] as const;

export type GameState = (typeof GAME_STATES)[number];

/**
 * States after which score and state are protected from unforced overwrite
 */
export const TERMINAL_STATES: ReadonlySet<GameState> = new Set<GameState>(['FINAL', 'POSTPONED', 'CANCELLED']);

/**
 * Remote `gameState` codes
 */
const REMOTE_GAME_STATES: ReadonlyMap<string, GameState> = new Map<string, GameState>([
  ['FUT', 'SCHEDULED'],
  ['PRE', 'SCHEDULED'],
  ['LIVE', 'LIVE'],
  ['CRIT', 'LIVE'],
  ['FINAL', 'FINAL'],
  ['OFF', 'FINAL'],
  ['PPD', 'POSTPONED'],
  ['CNCL', 'CANCELLED']
]);

/**
 * Remote `gameScheduleState` codes that override `gameState`
 */
const REMOTE_SCHEDULE_STATES: ReadonlyMap<string, GameState> = new Map<string, GameState>([
  ['PPD', 'POSTPONED'],
  ['CNCL', 'CANCELLED']
]);

/**
 * Resolves the lifecycle state from the remote codes
 *
 * @returns The mapped state, or null when `gameState` is an unknown code
 */
export function resolveGameState(remoteState: string, scheduleState: string): GameState | null {
  return REMOTE_SCHEDULE_STATES.get(scheduleState) ?? REMOTE_GAME_STATES.get(remoteState) ?? null;
}

export function isTerminal(state: GameState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isGameState(value: string): value is GameState {
  return GAME_STATES.some((state) => state === value);
}

/**
 * Game types as numbered by the remote API
 */
export const GAME_TYPES = {
  1: 'PRESEASON',
  2: 'REGULAR_SEASON',
  3: 'PLAYOFFS',
  4: 'ALL_STAR'
} as const;

export type GameType = keyof typeof GAME_TYPES;

export function isGameType(value: number): value is GameType {
  return Object.prototype.hasOwnProperty.call(GAME_TYPES, value);
}
