export * from './types.js';
export { SwiftLexer, SwiftSyntaxError, tokenizeSwift } from './swift-lexer.js';
export { SwiftParser, parseSwiftSource, classifyDeclaration } from './swift.js';
export { parseCondition, conditionText } from './condition.js';
export { printSourceFile, printToken, printTrivia, printTriviaPiece } from './printer.js';
