export { formatNode, formatOptionalNode, describeIterator, type KeyFormatter } from './labels';
export { render, computeSpans, renderLevels, LayoutError, type RenderOptions, type Span, type SpanTable } from './layout';
export { validate, findViolations, type Violation, type ViolationKind } from './validate';
export { printFromRoot } from './print';
export {
  setDiagnosticSink, getDiagnosticSink, getVerbosity, setVerbosity, resetVerbosity,
  VerbosityEnvVar, type DiagnosticSink
} from './log';
