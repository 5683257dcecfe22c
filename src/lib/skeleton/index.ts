/**
 * Skeleton module - Rust declarations without their bodies.
 */

export type {
  Declaration,
  DeclarationKind,
  EnumVariant,
  Fields,
  MethodSignature,
  SourceTree,
  StructField,
  Visibility,
} from "./model";
export { printSkeletons, readSource, type RunOptions } from "./runner";
export {
  fieldsTokens,
  type LineWriter,
  renderSkeleton,
  Skeletonizer,
} from "./skeletonizer";
export { displayPath, formatSkeletonHeader } from "./summary-formatter";
export { formatTokens, tokenize, type TokenStream } from "./tokens";
