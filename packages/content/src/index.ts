// @emberfall/content
// Validated content definitions (regions, activities, items, enemies) and factories into battle-engine objects
export * from "./types.js";
export { ContentValidationError, UnknownContentError, parseDefinition, validateDefinition } from "./validators.js";
export type { ValidationResult } from "./validators.js";
export { InMemoryContentProvider, loadContentDirectory } from "./provider.js";
export type { ContentProvider, InMemoryContentProviderOptions } from "./provider.js";
export {
  instantiateItem,
  itemResolverFor,
  spawnEnemy,
  spawnEncounter,
  enemiesForRegion,
  canAccessRegion,
  canTravelTo,
  travelToRegion,
  countById,
  rollEncounter,
  DEFAULT_ENCOUNTER_RATES,
} from "./factories.js";
export type { SpawnOptions, EncounterOptions, RegionAccess, TravelResult, EncounterRoll } from "./factories.js";
export { availableActivities, canPerformActivity, performActivity } from "./activities.js";
export type { ActivityLoot, ActivityResult } from "./activities.js";
export { BUILTIN_CONTENT_ROOT, loadBuiltinContent } from "./builtins/index.js";
