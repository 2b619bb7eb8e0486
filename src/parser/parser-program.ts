/**
 * Parser Extension: Program Parsing
 * Statement loop, terminators and keyword dispatch
 */

import { Parser, type StatementBody } from './parser.js';
import { Program } from './program.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  isStatementKeyword,
  type Statement,
  type StatementKeyword,
} from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  isAtEnd,
  parseError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): Program;
    parseStatement(): Statement;
    parseStatementBody(keyword: StatementKeyword): StatementBody;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): Program {
  const statements: Statement[] = [];

  while (!isAtEnd(this.state)) {
    // Empty statements
    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      continue;
    }

    statements.push(this.parseStatement());

    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
    } else if (!isAtEnd(this.state)) {
      throw parseError(this.state, 'MIXUP-P009', {
        actual: describeToken(current(this.state)),
      });
    }
  }

  return new Program(statements);
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): Statement {
  const token = current(this.state);
  if (token.type !== TOKEN_TYPES.WORD || !isStatementKeyword(token.value)) {
    this.state.keyword = token.value;
    throw parseError(this.state, 'MIXUP-P001', { keyword: token.value });
  }

  const keyword = token.value;
  this.state.keyword = keyword;
  advance(this.state);

  const body = this.parseStatementBody(keyword);
  const last = this.state.tokens[this.state.pos - 1] ?? token;
  return {
    ...body,
    keyword,
    span: { start: token.span.start, end: last.span.end },
  };
};

Parser.prototype.parseStatementBody = function (
  this: Parser,
  keyword: StatementKeyword
): StatementBody {
  switch (keyword) {
    case 'declareSpanType':
      return this.parseDeclare();
    case 'provide':
      return this.parseProvide();
    case 'require':
      return this.parseRequire();
    case 'annotateWith':
      return this.parseAnnotateWith();
    case 'defDict':
      return this.parseDefDict();
    case 'defLevel':
      return this.parseDefLevel();
    case 'onLevel':
      return this.parseOnLevel();
    case 'offLevel':
      return this.parseOffLevel();
    case 'importFromLevel':
      return this.parseImportFromLevel();
    case 'defSpanType':
    case 'defSpanProp':
    case 'defTokenProp':
      return this.parseLabeling(keyword);
  }
};
