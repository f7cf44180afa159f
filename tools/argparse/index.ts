export { ArgumentParser, EXIT_ERROR } from "./parser/argument-parser.js";
export {
  ArgParseError,
  ArgumentError,
  LiteralSyntaxError,
  ParserExit,
  SchemaDefinitionError,
  UsageError,
} from "./parser/errors.js";
export { Namespace } from "./parser/namespace.js";
export type {
  ArgumentParserOptions,
  ArgumentSpec,
  Classification,
  EnvSourceOptions,
  FieldDescriptor,
  FieldValue,
  ParserIO,
} from "./parser/types.js";
export { arg, describeField, describeModel, type ArgMetadata } from "./schema/descriptor.js";
export { classifyField } from "./schema/classify.js";
export { parseLiteralExpression, type LiteralExpression } from "./lib/literal-expression.js";
export {
  initializeEventEmitter,
  resetEventEmitter,
  type LogFormat,
  type LogRuntimeConfig,
} from "./lib/events.js";
export { formatValidationError } from "./validators/model.js";
