/**
 * Pipeline modules export
 */

export { createSiteContext } from "./context";
export { discover } from "./discover";
export { resolve } from "./resolver";
export { postProcess } from "./post-process";
export { paginate } from "./paginate";
export { render } from "./render";
export { assets } from "./assets";
export { stats } from "./stats";
