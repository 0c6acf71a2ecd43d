export {
  TileCodecError,
  AmbiguousValueError,
  TILE_COUNT,
  encodeTile,
  encodeJoker,
  decodeTile,
  isJoker,
  numberOf,
  colorOf,
  valueOf,
  fullUniverse,
  colorRank,
  compareTileIds,
  formatTile,
} from "./tile-codec";
