import { idleFamily } from "./families/idle.ts";
import { pursuitFamily } from "./families/pursuit.ts";
import { focusFireFamily } from "./families/focus-fire.ts";
import { squadFamily } from "./families/squad.ts";
import type { PilotFamily } from "./ai-schema.ts";

export const PILOT_FAMILIES: PilotFamily[] = [idleFamily, pursuitFamily, focusFireFamily, squadFamily];

export function getFamily(id: string): PilotFamily {
  const found = PILOT_FAMILIES.find((f) => f.id === id);
  if (!found) {
    throw new Error(`Unknown pilot family: ${id}`);
  }
  return found;
}
