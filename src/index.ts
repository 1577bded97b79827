// Public SDK surface for programmatic use
// Re-export core types
export type { Diagnostic, CompileContext } from './core/types.js';
export { DEFAULT_MAX_ARRAY_SIZE, DEFAULT_RANDOM_OPTIONS, PROBABILITY_EPSILON } from './core/types.js';

// Errors
export {
  CompileError,
  ExpressionSyntaxError,
  CompileTypeError,
  UnknownOperatorError,
  UnsupportedConstructError,
  ConfigurationError,
  ModelError,
  isCompileError,
} from './core/errors.js';

// Expressions
export type { Expression, Opcode, Value, ArrayValue } from './expression/model.js';
export { parseExpression, validateExpression } from './expression/parse.js';
export { printExpression } from './expression/print.js';
export { expressionToJson, expressionFromJson } from './expression/json.js';
export type { JaniOperand } from './expression/json.js';
export type { DataType } from './expression/types.js';
export { expandExpression } from './macros/expand.js';
export { expandDistributions } from './macros/distributions.js';

// Charts and models
export type { Chart, ChartState, ChartTransition, Step } from './chart/types.js';
export { validateChart } from './chart/schema.js';
export { compileChart } from './compiler/chart.js';
export { Automaton } from './automaton/automaton.js';
export { Model, serializeModel } from './model/model.js';
export type { JaniModelJson } from './model/model.js';
export { Composition } from './model/composition.js';
export { compileModel } from './model/compile.js';
export type { CompiledModel } from './model/compile.js';
export { validateDescriptor, descriptorSchema } from './model/descriptor.js';
export type { ModelDescriptor, DescriptorInput } from './model/descriptor.js';
export { expandRandomAssignments } from './model/random.js';
export { loadEnvironment } from './model/environment.js';
export type { Environment } from './model/environment.js';

// Formatting and file-level entry points
export { summarizeDiagnostics, textReport, toJsonResult } from './core/format.js';
export type { DiagnosticSummary, JsonResult } from './core/format.js';
export { compileDescriptor, compileDescriptorText, translateExpression } from './core/service.js';
export type { CompileResult, ExpressionResult, ChartReader } from './core/service.js';
