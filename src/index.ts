// Public SDK surface for programmatic use
export type {
  Severity,
  Violation,
  Location,
  TextRange,
  CorrectionEdit,
  Correction,
  FinalClassModifier,
  RuleOptions,
} from './core/types.js';

// Linting and correction
export { lint, correct, parseSource } from './core/linter.js';
export type { ParseResult, CorrectResult } from './core/linter.js';
export {
  NonOverridableClassDeclarationRule,
  ScopeTrackingVisitor,
  description as nonOverridableClassDeclaration,
  toViolations,
  toCorrectionEdits,
  traverse,
} from './rules/non-overridable-class-declaration.js';
export type { FlaggedDeclaration, ParsedSource, Traversal } from './rules/non-overridable-class-declaration.js';
export type { RuleDescription, Example, CorrectionExample } from './rules/types.js';
export { applyCorrections } from './core/corrections.js';
export type { AppliedCorrections, RuleIdentity } from './core/corrections.js';
export { SourceFile } from './core/source.js';

// Suppression
export { CommandSuppressionFilter, parseCommand, noSuppression } from './core/suppression.js';
export type { SuppressionFilter, RuleState, Command } from './core/suppression.js';

// Configuration
export { parseConfig, loadConfigFile, ConfigError, CONFIG_FILENAME } from './core/config.js';
export type { ConfigFile, RuleConfiguration } from './core/config.js';

// Documents, markdown and reporting
export { detectDocumentKind, validateDocument, correctDocument } from './core/router.js';
export type { DocumentKind, DocumentReport, DocumentCorrection } from './core/router.js';
export type { SwiftBlock } from './core/markdown.js';
export { extractSwiftBlocks, offsetViolations, rewriteSwiftBlocks } from './core/markdown.js';
export { textReport, correctionReport, toJsonResult } from './core/format.js';
export { applyEdits } from './core/edits.js';
export type { TextEdit } from './core/edits.js';

// Syntax tree
export type { SyntaxNode, SourceFileNode, DeclarationNode, Modifier } from './swift/tree.js';
