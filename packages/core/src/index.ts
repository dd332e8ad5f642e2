/**
 * Lox Front End
 * Exports lexer, parser, printer, AST types, and the error taxonomy
 */

export { LexerError, createLexerState, nextToken, scan } from './lexer/index.js';
export type { LexerState, ScanResult } from './lexer/index.js';
export { KEYWORDS, lookupKeyword } from './lexer/index.js';
export {
  DEFAULT_MAX_ARGUMENTS,
  DEFAULT_MAX_NESTING_DEPTH,
  parse,
  parseExpression,
  parseSource,
  Parser,
} from './parser/index.js';
export type {
  ExpressionParseResult,
  FunctionKind,
  ParseResult,
  ParserOptions,
  SourceParseResult,
} from './parser/index.js';

// ============================================================
// PRINTING AND DIAGNOSTICS
// ============================================================
export {
  formatLiteral,
  formatNumber,
  formatToken,
  printExpression,
  printProgram,
  printStatement,
} from './printer.js';
export {
  EXIT_CODES,
  type ExitCode,
  exitCodeFor,
  formatDiagnostic,
  formatDiagnostics,
  mergeErrors,
} from './diagnostics.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
  createError,
  LoxError,
  type LoxErrorData,
  ParseError,
} from './types.js';

// ============================================================
// TOKENS, LOCATIONS, AST
// ============================================================
export {
  TOKEN_TYPES,
  type Token,
  type TokenLiteral,
  type TokenType,
  type SourceLocation,
  type SourceSpan,
} from './types.js';
export type {
  ASTNode,
  AssignNode,
  BinaryNode,
  BlockStmtNode,
  CallNode,
  ClassStmtNode,
  ExpressionNode,
  ExpressionStmtNode,
  FunctionStmtNode,
  GetNode,
  GroupingNode,
  IfStmtNode,
  LiteralNode,
  LiteralValue,
  LogicalNode,
  PrintStmtNode,
  ProgramNode,
  ReturnStmtNode,
  SetNode,
  StatementNode,
  SuperNode,
  ThisNode,
  UnaryNode,
  VarStmtNode,
  VariableNode,
  WhileStmtNode,
} from './types.js';
