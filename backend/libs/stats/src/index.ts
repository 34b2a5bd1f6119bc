/* =========================================================
   Scene statistics – barrel
   ========================================================= */

export { scale, scaleSeries } from "./scale.js";
export type { StatEntry } from "./reader.js";
export { parseStatLines, readStats, toStatMap, toStatRecord, readStatRecord } from "./reader.js";
export type { NamingConvention, YearDay, KnownScene } from "./scene.js";
export {
  NAMING_CONVENTIONS,
  UNKNOWN_SCENE,
  resolveScene,
  requireKnownScene,
  sceneFromYearDay,
  sceneDate,
} from "./scene.js";
export type { RangeEntry } from "./ranges.js";
export { RangeRegistry, BAND_TYPE_RANGES } from "./ranges.js";
