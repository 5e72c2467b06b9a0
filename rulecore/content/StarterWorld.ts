// rulecore/content/StarterWorld.ts
//
// Loads the bundled starter world (data/starter_world.json): a village, a
// forest, a goblin, a merchant and the item/status concepts they reference.

import fs from "fs";
import path from "path";
import { z } from "zod";

import { CONCEPT_TYPES, type Concept } from "../concepts/ConceptTypes";
import { ValidationError } from "../errors/EngineErrors";
import { GameState, type GameStateOptions } from "../state/GameState";
import { JsonObjectSchema, PlayerStateSchema, WorldStateSchema } from "../state/StateSchemas";
import type { GameStateInit } from "../state/StateTypes";
import { Logger } from "../utils/logger";
import { formatZodIssues } from "../utils/zodIssues";

const log = Logger.scope("CONTENT");

// Beside the sources, or (from dist/) back in the source tree.
const CANDIDATES = [
  path.join(__dirname, "..", "data", "starter_world.json"),
  path.join(__dirname, "..", "..", "rulecore", "data", "starter_world.json"),
];

export const STARTER_WORLD_FILE = CANDIDATES.find((p) => fs.existsSync(p)) ?? path.join(__dirname, "..", "data", "starter_world.json");

const SeedConceptSchema = z.object({
  type: z.enum(CONCEPT_TYPES),
  name: z.string().min(1),
  description: z.string(),
  properties: JsonObjectSchema.default({}),
});

const WorldFileSchema = z.object({
  player: PlayerStateSchema,
  world: WorldStateSchema,
  concepts: z.array(SeedConceptSchema),
});

/** Read and validate a world file. Seeded concepts are stamped as turn 0. */
export function loadWorldFile(filePath: string = STARTER_WORLD_FILE): GameStateInit {
  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ValidationError(`cannot read world file ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }

  const parsed = WorldFileSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ValidationError(`invalid world file ${filePath}`, formatZodIssues(parsed.error));
  }

  const concepts: Concept[] = parsed.data.concepts.map((c) => ({ ...c, createdTurn: 0 }));
  log.debug("world file loaded", {
    filePath,
    locations: Object.keys(parsed.data.world.locations).length,
    npcs: Object.keys(parsed.data.world.npcs).length,
    concepts: concepts.length,
  });

  return { player: parsed.data.player, world: parsed.data.world, concepts };
}

export function createStarterState(opts: GameStateOptions & { sessionId?: string } = {}): GameState {
  const init = loadWorldFile();
  return new GameState(opts.sessionId ? { ...init, sessionId: opts.sessionId } : init, opts);
}
