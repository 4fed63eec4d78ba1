/**
 * 表达式语法分析（递归下降）
 *
 * 优先级（高 → 低）：
 * 后缀（. [] 调用）> 一元（! -）> 乘除模 > 加减 > 关系 > 相等 > in > && > || > 三元（右结合）
 *
 * 编译期检查：
 * - 函数名必须存在于注册表，参数个数在 [minArgs, maxArgs] 内
 * - 接收者调用 x.f(a) 视为 f(x, a)
 * - 嵌套深度不超过 EXPRESSION.MAX_NESTING
 */
import { EXPRESSION } from '../../constants/index.js';
import { ExpressionCompileError } from '../../utils/error/index.js';
import { tokenize } from './lexer.js';
import type { AstNode, BinaryOperator, FunctionRegistry, Token } from './types.js';

const EQUALITY_OPERATORS: ReadonlySet<string> = new Set(['==', '!=']);
const RELATIONAL_OPERATORS: ReadonlySet<string> = new Set(['<', '<=', '>', '>=']);
const ADDITIVE_OPERATORS: ReadonlySet<string> = new Set(['+', '-']);
const MULTIPLICATIVE_OPERATORS: ReadonlySet<string> = new Set(['*', '/', '%']);
const MEMBERSHIP_OPERATORS: ReadonlySet<string> = new Set(['in']);

function isBinaryOperator(text: string): text is BinaryOperator {
  return (
    EQUALITY_OPERATORS.has(text) ||
    RELATIONAL_OPERATORS.has(text) ||
    ADDITIVE_OPERATORS.has(text) ||
    MULTIPLICATIVE_OPERATORS.has(text) ||
    text === 'in'
  );
}

/**
 * 解析源码为语法树。
 *
 * @param source 表达式源码
 * @param functions 函数注册表（用于函数名与参数个数校验）
 * @throws ExpressionCompileError 词法、语法、函数名或参数个数错误
 */
export function parseExpression(source: string, functions: FunctionRegistry): AstNode {
  if (source.trim() === '') {
    throw new ExpressionCompileError('表达式为空', source, 0);
  }
  if (source.length > EXPRESSION.MAX_SOURCE_LENGTH) {
    throw new ExpressionCompileError(
      `表达式长度超过上限 ${EXPRESSION.MAX_SOURCE_LENGTH}`,
      source,
      EXPRESSION.MAX_SOURCE_LENGTH,
    );
  }

  const tokens = tokenize(source);
  let index = 0;
  let depth = 0;

  function peek(): Token {
    const token = tokens[index];
    if (token === undefined) {
      // tokenize 保证以 eof 结尾
      return { type: 'eof', text: '', position: source.length };
    }
    return token;
  }

  function advance(): Token {
    const token = peek();
    if (token.type !== 'eof') {
      index += 1;
    }
    return token;
  }

  function fail(message: string, token: Token): never {
    throw new ExpressionCompileError(message, source, token.position);
  }

  function describe(token: Token): string {
    return token.type === 'eof' ? '表达式结尾' : `'${token.text}'`;
  }

  function isOperator(text: string): boolean {
    const token = peek();
    return (token.type === 'operator' || token.type === 'keyword') && token.text === text;
  }

  function isPunctuation(text: string): boolean {
    const token = peek();
    return token.type === 'punctuation' && token.text === text;
  }

  function expectPunctuation(text: string): Token {
    const token = peek();
    if (token.type !== 'punctuation' || token.text !== text) {
      fail(`期望 '${text}'，实际为 ${describe(token)}`, token);
    }
    return advance();
  }

  function enter(token: Token): void {
    depth += 1;
    if (depth > EXPRESSION.MAX_NESTING) {
      fail(`嵌套层级超过上限 ${EXPRESSION.MAX_NESTING}`, token);
    }
  }

  function leave(): void {
    depth -= 1;
  }

  function resolveCall(name: string, args: ReadonlyArray<AstNode>, token: Token): AstNode {
    const fn = functions.get(name);
    if (!fn) {
      fail(`未知函数 '${name}'`, token);
    }
    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      const expected =
        fn.minArgs === fn.maxArgs
          ? `${fn.minArgs}`
          : Number.isFinite(fn.maxArgs)
            ? `${fn.minArgs}..${fn.maxArgs}`
            : `至少 ${fn.minArgs}`;
      fail(`函数 '${name}' 需要 ${expected} 个参数，实际为 ${args.length}`, token);
    }
    return { type: 'call', name, fn, args, position: token.position };
  }

  /** 解析逗号分隔的参数/元素，允许末尾逗号 */
  function parseList(closing: string): AstNode[] {
    const items: AstNode[] = [];
    while (!isPunctuation(closing)) {
      items.push(parseTernary());
      if (!isPunctuation(',')) {
        break;
      }
      advance();
    }
    expectPunctuation(closing);
    return items;
  }

  function parseTernary(): AstNode {
    const start = peek();
    enter(start);
    const test = parseOr();
    if (!isOperator('?')) {
      leave();
      return test;
    }
    advance();
    const consequent = parseTernary();
    const colon = peek();
    if (!(colon.type === 'operator' && colon.text === ':')) {
      fail(`期望 ':'，实际为 ${describe(colon)}`, colon);
    }
    advance();
    const alternate = parseTernary();
    leave();
    return { type: 'conditional', test, consequent, alternate, position: start.position };
  }

  function parseOr(): AstNode {
    let left = parseAnd();
    while (isOperator('||')) {
      const token = advance();
      const right = parseAnd();
      left = { type: 'logical', operator: '||', left, right, position: token.position };
    }
    return left;
  }

  function parseAnd(): AstNode {
    let left = parseMembership();
    while (isOperator('&&')) {
      const token = advance();
      const right = parseMembership();
      left = { type: 'logical', operator: '&&', left, right, position: token.position };
    }
    return left;
  }

  /** 通用左结合二元层级 */
  function parseBinaryLevel(operators: ReadonlySet<string>, next: () => AstNode): AstNode {
    let left = next();
    for (;;) {
      const token = peek();
      if (!(token.type === 'operator' || token.type === 'keyword') || !operators.has(token.text)) {
        return left;
      }
      const operator = token.text;
      if (!isBinaryOperator(operator)) {
        return left;
      }
      advance();
      const right = next();
      left = { type: 'binary', operator, left, right, position: token.position };
    }
  }

  function parseMembership(): AstNode {
    return parseBinaryLevel(MEMBERSHIP_OPERATORS, parseEquality);
  }

  function parseEquality(): AstNode {
    return parseBinaryLevel(EQUALITY_OPERATORS, parseRelational);
  }

  function parseRelational(): AstNode {
    return parseBinaryLevel(RELATIONAL_OPERATORS, parseAdditive);
  }

  function parseAdditive(): AstNode {
    return parseBinaryLevel(ADDITIVE_OPERATORS, parseMultiplicative);
  }

  function parseMultiplicative(): AstNode {
    return parseBinaryLevel(MULTIPLICATIVE_OPERATORS, parseUnary);
  }

  function parseUnary(): AstNode {
    const token = peek();
    if (token.type === 'operator' && (token.text === '!' || token.text === '-')) {
      const operator = token.text === '!' ? '!' : '-';
      advance();
      enter(token);
      const operand = parseUnary();
      leave();
      return { type: 'unary', operator, operand, position: token.position };
    }
    return parsePostfix();
  }

  function parsePostfix(): AstNode {
    let node = parsePrimary();
    for (;;) {
      if (isPunctuation('.')) {
        advance();
        const nameToken = advance();
        if (nameToken.type !== 'identifier' && nameToken.type !== 'keyword') {
          fail(`'.' 之后期望字段名，实际为 ${describe(nameToken)}`, nameToken);
        }
        if (isPunctuation('(')) {
          advance();
          const args = parseList(')');
          node = resolveCall(nameToken.text, [node, ...args], nameToken);
          continue;
        }
        node = { type: 'member', object: node, property: nameToken.text, position: nameToken.position };
        continue;
      }
      if (isPunctuation('[')) {
        const open = advance();
        const indexNode = parseTernary();
        expectPunctuation(']');
        node = { type: 'index', object: node, index: indexNode, position: open.position };
        continue;
      }
      if (isPunctuation('(')) {
        fail('只能调用具名函数', peek());
      }
      return node;
    }
  }

  function parsePrimary(): AstNode {
    const token = advance();
    switch (token.type) {
      case 'number':
      case 'string':
        if (token.literal === undefined) {
          fail('字面量缺少值', token);
        }
        return { type: 'literal', value: token.literal, position: token.position };
      case 'keyword':
        if (token.text === 'true' || token.text === 'false') {
          return { type: 'literal', value: token.text === 'true', position: token.position };
        }
        if (token.text === 'null') {
          return { type: 'literal', value: null, position: token.position };
        }
        return fail(`意外的关键字 '${token.text}'`, token);
      case 'identifier':
        if (isPunctuation('(')) {
          advance();
          const args = parseList(')');
          return resolveCall(token.text, args, token);
        }
        return { type: 'identifier', name: token.text, position: token.position };
      case 'punctuation':
        if (token.text === '(') {
          const inner = parseTernary();
          expectPunctuation(')');
          return inner;
        }
        if (token.text === '[') {
          const elements = parseList(']');
          return { type: 'list', elements, position: token.position };
        }
        if (token.text === '{') {
          return parseMapLiteral(token);
        }
        return fail(`意外的符号 ${describe(token)}`, token);
      default:
        return fail(`意外的 ${describe(token)}`, token);
    }
  }

  function parseMapLiteral(open: Token): AstNode {
    const entries: Array<{ key: AstNode; value: AstNode }> = [];
    while (!isPunctuation('}')) {
      const key = parseTernary();
      const colon = peek();
      if (!(colon.type === 'operator' && colon.text === ':')) {
        fail(`映射字面量期望 ':'，实际为 ${describe(colon)}`, colon);
      }
      advance();
      const value = parseTernary();
      entries.push({ key, value });
      if (!isPunctuation(',')) {
        break;
      }
      advance();
    }
    expectPunctuation('}');
    return { type: 'map', entries, position: open.position };
  }

  const ast = parseTernary();
  const trailing = peek();
  if (trailing.type !== 'eof') {
    fail(`多余的内容 ${describe(trailing)}`, trailing);
  }
  return ast;
}
