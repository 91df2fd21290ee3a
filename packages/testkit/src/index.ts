export { assert, describe, test } from "./nodeTest.js";
export { cssRules, countOccurrences } from "./css.js";
export {
  type InspectableAttr,
  type InspectableNode,
  classList,
  findNodes,
  textContent,
} from "./vdom.js";
