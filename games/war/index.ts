/**
 * War -- the two-player card game, with configurable discard recycling.
 */
export type { GameSummary, TurnOutcome, PlayerSnapshot } from './WarGame';
export { WarGame } from './WarGame';

export type { WarConfig, WarGameOptions } from './WarConfig';
export { DEFAULT_MAX_HANDS, WarConfigZ, parseWarConfig } from './WarConfig';

export { createWarGame } from './createWarGame';

export type {
  TurnRecord,
  GameMetadata,
  GameResults,
  WarTranscript,
} from './GameTranscript';
export { TranscriptRecorder } from './GameTranscript';
