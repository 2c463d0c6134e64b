export {
  DIALECTS,
  findDialect,
  isSupportedDialect,
  resolveDialectPair,
} from "./registry";
export type { DialectInfo } from "./registry";
export { SqlParserEngine } from "./engine";
export type { DialectEngine, TranslateOptions } from "./engine";
