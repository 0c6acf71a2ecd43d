export { validateAndPrice, validateMeld, meldId, canonicalTiles, type MeldResult } from "./meld-validator";
export {
  INITIAL_MELD_THRESHOLD,
  findPlayer,
  turnOwnerOk,
  checkTurn,
  ownsTiles,
  newlyPlayed,
  boardIntegrityOk,
  meldsValid,
  initialMeldOk,
  poolNonEmpty,
  hasWon,
  win,
} from "./game-rules";
export { joinGame, playTiles, drawTile, advanceTurn, applyTurnAction } from "./turn-engine";
export {
  MIN_PLAYERS,
  MAX_PLAYERS,
  INITIAL_RACK_SIZE,
  createGame,
  checkTileConservation,
  assertTileConservation,
  TileConservationError,
  type CreateGameOptions,
  type TileConservationReport,
} from "./game-state";
export { JOKER_PENALTY, rackPenalty, calculatePenalties, finishGame } from "./scoring";
export { createPlayerView, PlayerNotFoundError } from "./player-view";
export { PASS, violation, type RuleCheck, type TransitionResult } from "./results";
export { SeededRng, createRng } from "./prng";
