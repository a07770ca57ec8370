/**
 * Intermediate Representation (IR) module.
 *
 * The unroll algorithm produces this IR and the rendering backends consume it.
 * It is independent of every target language.
 */

export {
  type InputSource,
  type BitExpr,
  type InputBit,
  type ConstBit,
  type XorExpr,
  inputBit,
  constBit,
  xor,
  bitExprEquals,
  bitIdentity,
  sortKey,
  compareSortKeys,
  nodeCount,
} from "./bit.js";

export { Word } from "./word.js";
