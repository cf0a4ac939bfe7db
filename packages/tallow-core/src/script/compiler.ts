/**
 * Single-pass compiler
 *
 * A Pratt parser that emits bytecode straight into the chunk of the function
 * being compiled. There is no syntax tree: each parse rule consumes tokens
 * and writes the instructions for what it consumed.
 *
 * Scoping is tracked at compile time. A local's index in `locals` is the
 * slot it occupies relative to the call frame's base at run time; slot 0 is
 * reserved for the callee.
 */

import type { Chunk } from './chunk.js';
import type { OutputStream } from './config.js';
import { FunctionObj, type Heap, type StringObj } from './object.js';
import { OpCode, longForm } from './opcode.js';
import { Scanner } from './scanner.js';
import type { Source } from './source.js';
import { type Token, TokenType } from './token.js';
import { type Value, makeNumber, makeObject } from './value.js';

/** Slots addressable by a one-byte operand */
export const UINT8_COUNT = 256;
export const MAX_CONSTANTS = 65536;

export enum Precedence {
  NONE,
  ASSIGNMENT, // =
  OR, // or
  AND, // and
  EQUALITY, // == !=
  COMPARISON, // < > <= >=
  TERM, // + -
  FACTOR, // * /
  UNARY, // ! -
  CALL, // . () []
  PRIMARY,
}

type ParseFn = (compiler: Compiler, canAssign: boolean) => void;

interface ParseRule {
  prefix: ParseFn | null;
  infix: ParseFn | null;
  precedence: Precedence;
}

/**
 * What the compiler needs from its VM: somewhere to allocate, the string
 * interning table, and a diagnostic stream.
 */
export interface CompileHost {
  readonly heap: Heap;
  intern(chars: string): StringObj;
  readonly stderr: OutputStream;
}

interface Local {
  name: Token;
  /** -1 while declared but not yet initialized */
  depth: number;
}

enum FunctionType {
  Function,
  Script,
}

/**
 * Per-function compile state
 */
class FunctionState {
  public readonly locals: Local[] = [];
  public localCount = 0;
  public scopeDepth = 0;

  constructor(
    public readonly enclosing: FunctionState | null,
    public readonly fn: FunctionObj,
    public readonly type: FunctionType
  ) {
    // Slot 0 holds the callee; its empty name can never be resolved.
    this.locals[this.localCount++] = {
      name: { type: TokenType.Identifier, lexeme: '', start: 0, length: 0, line: 0, column: 0 },
      depth: 0,
    };
  }
}

/**
 * Token cursor plus error state
 */
export class Parser {
  public current: Token;
  public previous: Token;
  public hadError = false;
  public panicMode = false;

  constructor(
    private readonly scanner: Scanner,
    private readonly stderr: OutputStream
  ) {
    const start: Token = { type: TokenType.EOF, lexeme: '', start: 0, length: 0, line: 1, column: 1 };
    this.current = start;
    this.previous = start;
  }

  advance(): void {
    this.previous = this.current;

    for (;;) {
      this.current = this.scanner.scanToken();
      if (this.current.type !== TokenType.Error) break;
      this.errorAtCurrent(this.current.lexeme);
    }
  }

  check(type: TokenType): boolean {
    return this.current.type === type;
  }

  match(type: TokenType): boolean {
    if (!this.check(type)) return false;
    this.advance();
    return true;
  }

  consume(type: TokenType, message: string): void {
    if (this.check(type)) {
      this.advance();
      return;
    }
    this.errorAtCurrent(message);
  }

  errorAt(token: Token, message: string): void {
    if (this.panicMode) return;
    this.panicMode = true;
    this.hadError = true;

    let where = '';
    if (token.type === TokenType.EOF) {
      where = ' at end';
    } else if (token.type !== TokenType.Error) {
      where = ` at '${token.lexeme}'`;
    }

    this.stderr.write(`[line ${token.line}] Error${where}: ${message}\n`);
  }

  error(message: string): void {
    this.errorAt(this.previous, message);
  }

  errorAtCurrent(message: string): void {
    this.errorAt(this.current, message);
  }

  /**
   * Skip tokens until a statement boundary so one mistake produces one
   * diagnostic.
   */
  synchronize(): void {
    this.panicMode = false;

    while (this.current.type !== TokenType.EOF) {
      if (this.previous.type === TokenType.Semicolon) return;

      switch (this.current.type) {
        case TokenType.Class:
        case TokenType.Fun:
        case TokenType.Var:
        case TokenType.For:
        case TokenType.If:
        case TokenType.While:
        case TokenType.Print:
        case TokenType.Return:
          return;
      }

      this.advance();
    }
  }
}

export class Compiler {
  public readonly parser: Parser;
  private state: FunctionState;
  /** Every function allocated during this compilation */
  private readonly compiled: FunctionObj[] = [];

  constructor(
    private readonly host: CompileHost,
    source: Source
  ) {
    this.parser = new Parser(new Scanner(source), host.stderr);
    this.state = new FunctionState(null, this.newFunction(source, null), FunctionType.Script);
  }

  private newFunction(source: Source, name: StringObj | null): FunctionObj {
    const fn = this.host.heap.allocate(new FunctionObj(source, name));
    this.compiled.push(fn);
    return fn;
  }

  /**
   * Compile the whole source. Returns the script function, or null (after
   * releasing everything it allocated) if any error was reported.
   */
  compile(): FunctionObj | null {
    this.parser.advance();

    while (!this.parser.match(TokenType.EOF)) {
      this.declaration();
    }

    const fn = this.endFunction();
    if (this.parser.hadError) {
      for (const compiled of this.compiled) this.host.heap.free(compiled);
      return null;
    }
    return fn;
  }

  currentChunk(): Chunk {
    return this.state.fn.chunk;
  }

  // Emitters

  emitByte(byte: number): void {
    const token = this.parser.previous;
    this.currentChunk().emit(byte, token.line, token.column);
  }

  emitBytes(...bytes: number[]): void {
    for (const byte of bytes) this.emitByte(byte);
  }

  /**
   * Emit `op` with its operand, switching to the long form with a 16-bit
   * big-endian operand when the index does not fit a byte.
   */
  emitOperand(op: OpCode, index: number): void {
    const long = longForm[op];
    if (index >= UINT8_COUNT && long !== undefined) {
      this.emitBytes(long, (index >> 8) & 0xff, index & 0xff);
    } else {
      this.emitBytes(op, index);
    }
  }

  makeConstant(value: Value): number {
    const constant = this.currentChunk().addConstant(value, false);
    if (constant >= MAX_CONSTANTS) {
      this.parser.error('Too many constants in one chunk.');
      return 0;
    }
    return constant;
  }

  emitConstant(value: Value): void {
    this.emitOperand(OpCode.CONST, this.makeConstant(value));
  }

  emitJump(op: OpCode): number {
    this.emitBytes(op, 0xff, 0xff);
    return this.currentChunk().count - 2;
  }

  patchJump(offset: number): void {
    const chunk = this.currentChunk();
    // -2 to account for the operand bytes themselves.
    const jump = chunk.count - offset - 2;
    if (jump > 0xffff) {
      this.parser.error('Too much code to jump over.');
    }

    chunk.code[offset] = (jump >> 8) & 0xff;
    chunk.code[offset + 1] = jump & 0xff;
  }

  emitLoop(loopStart: number): void {
    this.emitByte(OpCode.LOOP);

    const offset = this.currentChunk().count - loopStart + 2;
    if (offset > 0xffff) this.parser.error('Loop body too large.');

    this.emitBytes((offset >> 8) & 0xff, offset & 0xff);
  }

  emitReturn(): void {
    this.emitBytes(OpCode.NIL, OpCode.RET);
  }

  private endFunction(): FunctionObj {
    this.emitReturn();
    const fn = this.state.fn;
    if (this.state.enclosing) this.state = this.state.enclosing;

    if (process.env.DEBUG_COMPILE && !this.parser.hadError) {
      console.error(`[compile] ${fn.toString()}: ${fn.chunk.count} bytes, ${fn.chunk.constants.length} constants`);
    }
    return fn;
  }

  // Expressions

  parsePrecedence(precedence: Precedence): void {
    this.parser.advance();
    const prefixRule = getRule(this.parser.previous.type).prefix;
    if (prefixRule === null) {
      this.parser.error('Expect expression.');
      return;
    }

    const canAssign = precedence <= Precedence.ASSIGNMENT;
    prefixRule(this, canAssign);

    while (precedence <= getRule(this.parser.current.type).precedence) {
      this.parser.advance();
      const infixRule = getRule(this.parser.previous.type).infix;
      if (infixRule !== null) infixRule(this, canAssign);
    }

    if (canAssign && this.parser.match(TokenType.Equal)) {
      this.parser.error('Invalid assignment target.');
    }
  }

  expression(): void {
    this.parsePrecedence(Precedence.ASSIGNMENT);
  }

  identifierConstant(name: Token): number {
    return this.makeConstant(makeObject(this.host.intern(name.lexeme)));
  }

  internConstant(chars: string): Value {
    return makeObject(this.host.intern(chars));
  }

  namedVariable(name: Token, canAssign: boolean): void {
    let getOp: OpCode;
    let setOp: OpCode;
    let arg = this.resolveLocal(name);

    if (arg !== -1) {
      getOp = OpCode.LD;
      setOp = OpCode.ST;
    } else {
      arg = this.identifierConstant(name);
      getOp = OpCode.GLD;
      setOp = OpCode.GST;
    }

    if (canAssign && this.parser.match(TokenType.Equal)) {
      this.expression();
      this.emitOperand(setOp, arg);
    } else {
      this.emitOperand(getOp, arg);
    }
  }

  argumentList(): number {
    let argCount = 0;
    if (!this.parser.check(TokenType.RightParen)) {
      do {
        this.expression();
        if (argCount === 255) {
          this.parser.error("Can't have more than 255 arguments.");
        }
        argCount++;
      } while (this.parser.match(TokenType.Comma));
    }
    this.parser.consume(TokenType.RightParen, "Expect ')' after arguments.");
    return argCount & 0xff;
  }

  mapLiteral(): void {
    let count = 0;
    if (!this.parser.check(TokenType.RightBrace)) {
      do {
        // A bare identifier names a string key.
        if (this.parser.match(TokenType.Identifier)) {
          this.emitConstant(this.internConstant(this.parser.previous.lexeme));
        } else {
          this.expression();
        }
        this.parser.consume(TokenType.Colon, "Expect ':' after map key.");
        this.expression();

        if (count === 255) {
          this.parser.error("Can't have more than 255 entries in a map literal.");
        }
        count++;
      } while (this.parser.match(TokenType.Comma));
    }
    this.parser.consume(TokenType.RightBrace, "Expect '}' after map entries.");
    this.emitBytes(OpCode.MAP, count & 0xff);
  }

  // Variables and scopes

  private addLocal(name: Token): void {
    if (this.state.localCount === UINT8_COUNT) {
      this.parser.error('Too many local variables in function.');
      return;
    }
    this.state.locals[this.state.localCount++] = { name, depth: -1 };
  }

  private declareVariable(): void {
    if (this.state.scopeDepth === 0) return;

    const name = this.parser.previous;
    for (let i = this.state.localCount - 1; i >= 0; i--) {
      const local = this.state.locals[i];
      if (local.depth !== -1 && local.depth < this.state.scopeDepth) break;

      if (local.name.lexeme === name.lexeme) {
        this.parser.error('Already a variable with this name in this scope.');
      }
    }

    this.addLocal(name);
  }

  private parseVariable(message: string): number {
    this.parser.consume(TokenType.Identifier, message);

    this.declareVariable();
    if (this.state.scopeDepth > 0) return 0;

    return this.identifierConstant(this.parser.previous);
  }

  private markInitialized(): void {
    if (this.state.scopeDepth === 0) return;
    this.state.locals[this.state.localCount - 1].depth = this.state.scopeDepth;
  }

  private defineVariable(global: number): void {
    if (this.state.scopeDepth > 0) {
      this.markInitialized();
      return;
    }
    this.emitOperand(OpCode.DEF, global);
  }

  resolveLocal(name: Token): number {
    for (let i = this.state.localCount - 1; i >= 0; i--) {
      const local = this.state.locals[i];
      if (local.name.lexeme === name.lexeme) {
        if (local.depth === -1) {
          this.parser.error('Cannot read local variable in its own initializer.');
        }
        return i;
      }
    }
    return -1;
  }

  private beginScope(): void {
    this.state.scopeDepth++;
  }

  private endScope(): void {
    const state = this.state;
    state.scopeDepth--;

    // Locals left at depth -1 by an error still belong to the closing scope.
    while (state.localCount > 0) {
      const depth = state.locals[state.localCount - 1].depth;
      if (depth !== -1 && depth <= state.scopeDepth) break;
      this.emitByte(OpCode.POP);
      state.localCount--;
    }
  }

  // Declarations and statements

  private declaration(): void {
    if (this.parser.match(TokenType.Fun)) {
      this.funDeclaration();
    } else if (this.parser.match(TokenType.Var)) {
      this.varDeclaration();
    } else {
      this.statement();
    }

    if (this.parser.panicMode) this.parser.synchronize();
  }

  private funDeclaration(): void {
    const global = this.parseVariable('Expect function name.');
    this.markInitialized();
    this.functionBody();
    this.defineVariable(global);
  }

  private functionBody(): void {
    const name = this.host.intern(this.parser.previous.lexeme);
    const fn = this.newFunction(this.currentChunk().source, name);
    this.state = new FunctionState(this.state, fn, FunctionType.Function);
    this.beginScope();

    this.parser.consume(TokenType.LeftParen, "Expect '(' after function name.");
    if (!this.parser.check(TokenType.RightParen)) {
      do {
        fn.arity++;
        if (fn.arity > 255) {
          this.parser.errorAtCurrent("Can't have more than 255 parameters.");
        }
        const constant = this.parseVariable('Expect parameter name.');
        this.defineVariable(constant);
      } while (this.parser.match(TokenType.Comma));
    }
    this.parser.consume(TokenType.RightParen, "Expect ')' after parameters.");
    this.parser.consume(TokenType.LeftBrace, "Expect '{' before function body.");
    this.block();

    // The frame is discarded by RET, so the scope is not closed with POPs.
    this.endFunction();
    this.emitConstant(makeObject(fn));
  }

  private varDeclaration(): void {
    const global = this.parseVariable('Expect variable name.');

    if (this.parser.match(TokenType.Equal)) {
      this.expression();
    } else {
      this.emitByte(OpCode.NIL);
    }
    this.parser.consume(TokenType.Semicolon, "Expect ';' after variable declaration.");

    this.defineVariable(global);
  }

  private statement(): void {
    if (this.parser.match(TokenType.Print)) {
      this.printStatement();
    } else if (this.parser.match(TokenType.If)) {
      this.ifStatement();
    } else if (this.parser.match(TokenType.While)) {
      this.whileStatement();
    } else if (this.parser.match(TokenType.For)) {
      this.forStatement();
    } else if (this.parser.match(TokenType.Return)) {
      this.returnStatement();
    } else if (this.parser.match(TokenType.LeftBrace)) {
      this.beginScope();
      this.block();
      this.endScope();
    } else {
      this.expressionStatement();
    }
  }

  private block(): void {
    while (!this.parser.check(TokenType.RightBrace) && !this.parser.check(TokenType.EOF)) {
      this.declaration();
    }
    this.parser.consume(TokenType.RightBrace, "Expect '}' after block.");
  }

  private printStatement(): void {
    let count = 0;
    do {
      this.expression();
      if (count === 255) this.parser.error("Can't print more than 255 values.");
      count++;
    } while (this.parser.match(TokenType.Comma));

    this.parser.consume(TokenType.Semicolon, "Expect ';' after value.");
    this.emitBytes(OpCode.PRINT, count & 0xff);
  }

  private expressionStatement(): void {
    this.expression();
    this.parser.consume(TokenType.Semicolon, "Expect ';' after expression.");
    this.emitByte(OpCode.POP);
  }

  private ifStatement(): void {
    this.parser.consume(TokenType.LeftParen, "Expect '(' after 'if'.");
    this.expression();
    this.parser.consume(TokenType.RightParen, "Expect ')' after condition.");

    const thenJump = this.emitJump(OpCode.JMPF);
    this.emitByte(OpCode.POP);
    this.statement();

    const elseJump = this.emitJump(OpCode.JMP);
    this.patchJump(thenJump);
    this.emitByte(OpCode.POP);

    if (this.parser.match(TokenType.Else)) this.statement();
    this.patchJump(elseJump);
  }

  private whileStatement(): void {
    const loopStart = this.currentChunk().count;
    this.parser.consume(TokenType.LeftParen, "Expect '(' after 'while'.");
    this.expression();
    this.parser.consume(TokenType.RightParen, "Expect ')' after condition.");

    const exitJump = this.emitJump(OpCode.JMPF);
    this.emitByte(OpCode.POP);
    this.statement();
    this.emitLoop(loopStart);

    this.patchJump(exitJump);
    this.emitByte(OpCode.POP);
  }

  private forStatement(): void {
    this.beginScope();
    this.parser.consume(TokenType.LeftParen, "Expect '(' after 'for'.");

    if (this.parser.match(TokenType.Semicolon)) {
      // No initializer.
    } else if (this.parser.match(TokenType.Var)) {
      this.varDeclaration();
    } else {
      this.expressionStatement();
    }

    let loopStart = this.currentChunk().count;
    let exitJump = -1;
    if (!this.parser.match(TokenType.Semicolon)) {
      this.expression();
      this.parser.consume(TokenType.Semicolon, "Expect ';' after loop condition.");

      exitJump = this.emitJump(OpCode.JMPF);
      this.emitByte(OpCode.POP);
    }

    if (!this.parser.match(TokenType.RightParen)) {
      const bodyJump = this.emitJump(OpCode.JMP);
      const incrementStart = this.currentChunk().count;
      this.expression();
      this.emitByte(OpCode.POP);
      this.parser.consume(TokenType.RightParen, "Expect ')' after for clauses.");

      this.emitLoop(loopStart);
      loopStart = incrementStart;
      this.patchJump(bodyJump);
    }

    this.statement();
    this.emitLoop(loopStart);

    if (exitJump !== -1) {
      this.patchJump(exitJump);
      this.emitByte(OpCode.POP);
    }

    this.endScope();
  }

  private returnStatement(): void {
    if (this.state.type === FunctionType.Script) {
      this.parser.error("Can't return from top-level code.");
    }

    if (this.parser.match(TokenType.Semicolon)) {
      this.emitReturn();
    } else {
      this.expression();
      this.parser.consume(TokenType.Semicolon, "Expect ';' after return value.");
      this.emitByte(OpCode.RET);
    }
  }
}

// Parse rules

function grouping(compiler: Compiler): void {
  compiler.expression();
  compiler.parser.consume(TokenType.RightParen, "Expect ')' after expression.");
}

function call(compiler: Compiler): void {
  const argCount = compiler.argumentList();
  compiler.emitBytes(OpCode.CALL, argCount);
}

function dot(compiler: Compiler, canAssign: boolean): void {
  compiler.parser.consume(TokenType.Identifier, "Expect property name after '.'.");
  const name = compiler.identifierConstant(compiler.parser.previous);

  if (canAssign && compiler.parser.match(TokenType.Equal)) {
    compiler.expression();
    compiler.emitOperand(OpCode.SET, name);
  } else {
    compiler.emitOperand(OpCode.GET, name);
  }
}

function subscript(compiler: Compiler, canAssign: boolean): void {
  compiler.expression();
  compiler.parser.consume(TokenType.RightBracket, "Expect ']' after index.");

  if (canAssign && compiler.parser.match(TokenType.Equal)) {
    compiler.expression();
    compiler.emitByte(OpCode.SETI);
  } else {
    compiler.emitByte(OpCode.GETI);
  }
}

function mapLiteral(compiler: Compiler): void {
  compiler.mapLiteral();
}

function unary(compiler: Compiler): void {
  const operatorType = compiler.parser.previous.type;
  compiler.parsePrecedence(Precedence.UNARY);

  switch (operatorType) {
    case TokenType.Minus:
      compiler.emitByte(OpCode.NEG);
      break;
    case TokenType.Bang:
      compiler.emitByte(OpCode.NOT);
      break;
  }
}

function binary(compiler: Compiler): void {
  const operatorType = compiler.parser.previous.type;
  const parseRule = getRule(operatorType);
  compiler.parsePrecedence(parseRule.precedence + 1);

  switch (operatorType) {
    case TokenType.EqualEqual:
      compiler.emitByte(OpCode.EQ);
      break;
    case TokenType.BangEqual:
      compiler.emitBytes(OpCode.EQ, OpCode.NOT);
      break;
    case TokenType.Less:
      compiler.emitByte(OpCode.LT);
      break;
    case TokenType.LessEqual:
      compiler.emitByte(OpCode.LE);
      break;
    case TokenType.Greater:
      compiler.emitBytes(OpCode.LE, OpCode.NOT);
      break;
    case TokenType.GreaterEqual:
      compiler.emitBytes(OpCode.LT, OpCode.NOT);
      break;
    case TokenType.Plus:
      compiler.emitByte(OpCode.ADD);
      break;
    case TokenType.Minus:
      compiler.emitByte(OpCode.SUB);
      break;
    case TokenType.Star:
      compiler.emitByte(OpCode.MUL);
      break;
    case TokenType.Slash:
      compiler.emitByte(OpCode.DIV);
      break;
  }
}

function and_(compiler: Compiler): void {
  const endJump = compiler.emitJump(OpCode.JMPF);
  compiler.emitByte(OpCode.POP);
  compiler.parsePrecedence(Precedence.AND);
  compiler.patchJump(endJump);
}

function or_(compiler: Compiler): void {
  const elseJump = compiler.emitJump(OpCode.JMPF);
  const endJump = compiler.emitJump(OpCode.JMP);

  compiler.patchJump(elseJump);
  compiler.emitByte(OpCode.POP);

  compiler.parsePrecedence(Precedence.OR);
  compiler.patchJump(endJump);
}

function literal(compiler: Compiler): void {
  switch (compiler.parser.previous.type) {
    case TokenType.False:
      compiler.emitByte(OpCode.FALSE);
      break;
    case TokenType.True:
      compiler.emitByte(OpCode.TRUE);
      break;
    case TokenType.Nil:
      compiler.emitByte(OpCode.NIL);
      break;
  }
}

function number(compiler: Compiler): void {
  compiler.emitConstant(makeNumber(Number(compiler.parser.previous.lexeme)));
}

function string(compiler: Compiler): void {
  const lexeme = compiler.parser.previous.lexeme;
  compiler.emitConstant(compiler.internConstant(lexeme.slice(1, -1)));
}

function variable(compiler: Compiler, canAssign: boolean): void {
  compiler.namedVariable(compiler.parser.previous, canAssign);
}

function rule(prefix: ParseFn | null, infix: ParseFn | null, precedence: Precedence): ParseRule {
  return { prefix, infix, precedence };
}

const rules: Record<TokenType, ParseRule> = {
  [TokenType.LeftParen]: rule(grouping, call, Precedence.CALL),
  [TokenType.RightParen]: rule(null, null, Precedence.NONE),
  [TokenType.LeftBrace]: rule(mapLiteral, null, Precedence.NONE),
  [TokenType.RightBrace]: rule(null, null, Precedence.NONE),
  [TokenType.LeftBracket]: rule(null, subscript, Precedence.CALL),
  [TokenType.RightBracket]: rule(null, null, Precedence.NONE),
  [TokenType.Comma]: rule(null, null, Precedence.NONE),
  [TokenType.Dot]: rule(null, dot, Precedence.CALL),
  [TokenType.Minus]: rule(unary, binary, Precedence.TERM),
  [TokenType.Plus]: rule(null, binary, Precedence.TERM),
  [TokenType.Semicolon]: rule(null, null, Precedence.NONE),
  [TokenType.Colon]: rule(null, null, Precedence.NONE),
  [TokenType.Slash]: rule(null, binary, Precedence.FACTOR),
  [TokenType.Star]: rule(null, binary, Precedence.FACTOR),
  [TokenType.Bang]: rule(unary, null, Precedence.NONE),
  [TokenType.BangEqual]: rule(null, binary, Precedence.EQUALITY),
  [TokenType.Equal]: rule(null, null, Precedence.NONE),
  [TokenType.EqualEqual]: rule(null, binary, Precedence.EQUALITY),
  [TokenType.Greater]: rule(null, binary, Precedence.COMPARISON),
  [TokenType.GreaterEqual]: rule(null, binary, Precedence.COMPARISON),
  [TokenType.Less]: rule(null, binary, Precedence.COMPARISON),
  [TokenType.LessEqual]: rule(null, binary, Precedence.COMPARISON),
  [TokenType.Identifier]: rule(variable, null, Precedence.NONE),
  [TokenType.String]: rule(string, null, Precedence.NONE),
  [TokenType.Number]: rule(number, null, Precedence.NONE),
  [TokenType.And]: rule(null, and_, Precedence.AND),
  [TokenType.Class]: rule(null, null, Precedence.NONE),
  [TokenType.Else]: rule(null, null, Precedence.NONE),
  [TokenType.False]: rule(literal, null, Precedence.NONE),
  [TokenType.For]: rule(null, null, Precedence.NONE),
  [TokenType.Fun]: rule(null, null, Precedence.NONE),
  [TokenType.If]: rule(null, null, Precedence.NONE),
  [TokenType.Nil]: rule(literal, null, Precedence.NONE),
  [TokenType.Or]: rule(null, or_, Precedence.OR),
  [TokenType.Print]: rule(null, null, Precedence.NONE),
  [TokenType.Return]: rule(null, null, Precedence.NONE),
  [TokenType.Super]: rule(null, null, Precedence.NONE),
  [TokenType.This]: rule(null, null, Precedence.NONE),
  [TokenType.True]: rule(literal, null, Precedence.NONE),
  [TokenType.Var]: rule(null, null, Precedence.NONE),
  [TokenType.While]: rule(null, null, Precedence.NONE),
  [TokenType.Error]: rule(null, null, Precedence.NONE),
  [TokenType.EOF]: rule(null, null, Precedence.NONE),
};

function getRule(type: TokenType): ParseRule {
  return rules[type];
}

/**
 * Compile a source into its top-level script function. Returns null when
 * compilation failed; diagnostics have already been written to the host's
 * stderr.
 */
export function compile(host: CompileHost, source: Source): FunctionObj | null {
  return new Compiler(host, source).compile();
}
