/**
 * Pipeline modules export
 */

export { preflight } from "./preflight";
export { scan } from "./scanner";
export { structure } from "./structure";
export { interlink } from "./interlinker";
export { write } from "./writer";
export { navigation } from "./navigation";
export { stats } from "./stats";
