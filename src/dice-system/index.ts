/**
 * Dice System Module
 *
 * Dice faces and rolling, the tile catalog, and the two tile
 * containers (a player's stack and an identity-keyed pool).
 */
export const DICE_SYSTEM_VERSION = '0.1.0';

// Dice
export type { DieFace } from './Dice';
export {
  DIE_FACES,
  DICE_PER_TURN,
  pointValue,
  rollDie,
  rollDice,
  countFace,
} from './Dice';

// Tiles
export type { Tile } from './Tile';
export {
  TILE_MIN_VALUE,
  TILE_MAX_VALUE,
  wormCountFor,
  createTile,
  createTileSet,
  sumWorms,
} from './Tile';

// Containers
export { TileStack } from './TileStack';
export { TilePool } from './TilePool';
