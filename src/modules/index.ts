/**
 * Pipeline modules export
 */

export { load } from "./loader";
export { migrate } from "./migrator";
export type { MigrateDependencies } from "./migrator";
export { report } from "./reporter";
export { stats } from "./stats";
