/**
 * 表达式词法分析
 *
 * 支持：
 * - 数字：整数、小数、科学计数法（1e-3）
 * - 字符串：单引号或双引号，转义 \n \t \r \\ \' \"
 * - 标识符与关键字（true / false / null / in）
 * - 运算符：+ - * / % ! == != < <= > >= && || ? :
 * - 分隔符：( ) [ ] { } , .
 */
import { ExpressionCompileError } from '../../utils/error/index.js';
import type { Token } from './types.js';

const KEYWORDS: ReadonlySet<string> = new Set(['true', 'false', 'null', 'in']);

/** 双字符运算符需先于单字符匹配 */
const TWO_CHAR_OPERATORS: ReadonlySet<string> = new Set(['==', '!=', '<=', '>=', '&&', '||']);

const ONE_CHAR_OPERATORS: ReadonlySet<string> = new Set([
  '+',
  '-',
  '*',
  '/',
  '%',
  '!',
  '<',
  '>',
  '?',
  ':',
]);

const PUNCTUATION: ReadonlySet<string> = new Set(['(', ')', '[', ']', '{', '}', ',', '.']);

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function readNumber(source: string, start: number): { token: Token; end: number } {
  let pos = start;
  while (pos < source.length && isDigit(source.charAt(pos))) {
    pos += 1;
  }
  if (source.charAt(pos) === '.' && isDigit(source.charAt(pos + 1))) {
    pos += 1;
    while (pos < source.length && isDigit(source.charAt(pos))) {
      pos += 1;
    }
  }
  const expChar = source.charAt(pos);
  if (expChar === 'e' || expChar === 'E') {
    let expPos = pos + 1;
    const sign = source.charAt(expPos);
    if (sign === '+' || sign === '-') {
      expPos += 1;
    }
    if (!isDigit(source.charAt(expPos))) {
      throw new ExpressionCompileError('数字指数部分不完整', source, pos);
    }
    while (expPos < source.length && isDigit(source.charAt(expPos))) {
      expPos += 1;
    }
    pos = expPos;
  }
  const text = source.slice(start, pos);
  return {
    token: { type: 'number', text, position: start, literal: Number(text) },
    end: pos,
  };
}

function readString(source: string, start: number): { token: Token; end: number } {
  const quote = source.charAt(start);
  let pos = start + 1;
  let value = '';
  while (pos < source.length) {
    const ch = source.charAt(pos);
    if (ch === quote) {
      return {
        token: { type: 'string', text: source.slice(start, pos + 1), position: start, literal: value },
        end: pos + 1,
      };
    }
    if (ch === '\\') {
      const next = source.charAt(pos + 1);
      const escaped = ESCAPES[next];
      if (escaped === undefined) {
        throw new ExpressionCompileError(`无效的转义序列 \\${next}`, source, pos);
      }
      value += escaped;
      pos += 2;
      continue;
    }
    value += ch;
    pos += 1;
  }
  throw new ExpressionCompileError('字符串未闭合', source, start);
}

/**
 * 将源码切分为词法单元，末尾附带 eof。
 *
 * @throws ExpressionCompileError 遇到无法识别的字符、未闭合字符串或非法转义
 */
export function tokenize(source: string): ReadonlyArray<Token> {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      pos += 1;
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(source.charAt(pos + 1)))) {
      const { token, end } = readNumber(source, pos);
      tokens.push(token);
      pos = end;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { token, end } = readString(source, pos);
      tokens.push(token);
      pos = end;
      continue;
    }

    if (isIdentifierStart(ch)) {
      const start = pos;
      while (pos < source.length && isIdentifierPart(source.charAt(pos))) {
        pos += 1;
      }
      const text = source.slice(start, pos);
      tokens.push({ type: KEYWORDS.has(text) ? 'keyword' : 'identifier', text, position: start });
      continue;
    }

    const pair = source.slice(pos, pos + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      tokens.push({ type: 'operator', text: pair, position: pos });
      pos += 2;
      continue;
    }

    if (ONE_CHAR_OPERATORS.has(ch)) {
      tokens.push({ type: 'operator', text: ch, position: pos });
      pos += 1;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ type: 'punctuation', text: ch, position: pos });
      pos += 1;
      continue;
    }

    throw new ExpressionCompileError(`无法识别的字符 '${ch}'`, source, pos);
  }

  tokens.push({ type: 'eof', text: '', position: source.length });
  return tokens;
}
