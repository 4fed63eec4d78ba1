import type { ExpressionCompileError, ExpressionEvalError } from '../../utils/error/index.js';
import type { Logger } from '../../utils/logger/types.js';
import type { LruCacheStats } from '../../utils/lruCache/types.js';
import type { ExpressionContext, Value } from '../../types/expression.js';

/**
 * 词法单元类型。
 */
export type TokenType =
  | 'number'
  | 'string'
  | 'identifier'
  | 'keyword'
  | 'operator'
  | 'punctuation'
  | 'eof';

/**
 * 词法单元。
 * 类型用途：lexer 输出、parser 输入；position 为源码中的起始偏移（0 起）。
 * 使用范围：仅 expressionEngine 模块内部使用。
 */
export type Token = {
  readonly type: TokenType;
  readonly text: string;
  readonly position: number;
  /** number/string 字面量的解析值 */
  readonly literal?: number | string | undefined;
};

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | 'in';

export type LogicalOperator = '&&' | '||';

export type UnaryOperator = '!' | '-';

/**
 * 语法树节点（可辨识联合，按 type 区分）。
 * 类型用途：parser 输出、interpreter 输入；函数调用节点在编译期已绑定内置函数。
 * 使用范围：仅 expressionEngine 模块内部使用。
 */
export type AstNode =
  | { readonly type: 'literal'; readonly value: Value; readonly position: number }
  | { readonly type: 'identifier'; readonly name: string; readonly position: number }
  | { readonly type: 'list'; readonly elements: ReadonlyArray<AstNode>; readonly position: number }
  | {
      readonly type: 'map';
      readonly entries: ReadonlyArray<Readonly<{ key: AstNode; value: AstNode }>>;
      readonly position: number;
    }
  | {
      readonly type: 'unary';
      readonly operator: UnaryOperator;
      readonly operand: AstNode;
      readonly position: number;
    }
  | {
      readonly type: 'binary';
      readonly operator: BinaryOperator;
      readonly left: AstNode;
      readonly right: AstNode;
      readonly position: number;
    }
  | {
      readonly type: 'logical';
      readonly operator: LogicalOperator;
      readonly left: AstNode;
      readonly right: AstNode;
      readonly position: number;
    }
  | {
      readonly type: 'conditional';
      readonly test: AstNode;
      readonly consequent: AstNode;
      readonly alternate: AstNode;
      readonly position: number;
    }
  | {
      readonly type: 'member';
      readonly object: AstNode;
      readonly property: string;
      readonly position: number;
    }
  | {
      readonly type: 'index';
      readonly object: AstNode;
      readonly index: AstNode;
      readonly position: number;
    }
  | {
      readonly type: 'call';
      readonly name: string;
      readonly fn: BuiltinFunction;
      readonly args: ReadonlyArray<AstNode>;
      readonly position: number;
    };

/**
 * 内置函数运行时环境。
 * 类型用途：传给内置函数的上下文与时钟；函数不得持有其他可变全局状态。
 */
export type FunctionRuntime = {
  readonly context: ExpressionContext;
  /** 当前时间（毫秒） */
  readonly now: () => number;
  readonly logger: Logger;
};

/**
 * 内置函数描述。
 * 类型用途：函数注册表的值；minArgs/maxArgs 在编译期校验，maxArgs 为 Infinity 表示可变参数。
 * 使用范围：expressionEngine 的 functions 子模块与 parser。
 */
export type BuiltinFunction = {
  readonly name: string;
  readonly minArgs: number;
  readonly maxArgs: number;
  readonly call: (args: ReadonlyArray<Value>, runtime: FunctionRuntime) => Value;
};

export type FunctionRegistry = ReadonlyMap<string, BuiltinFunction>;

/**
 * 已编译表达式。
 * 类型用途：compile 返回值，可重复求值；对象本身不可变。
 */
export type CompiledExpression = {
  readonly source: string;
  readonly ast: AstNode;
};

/**
 * 求值结果：成功携带值，失败携带错误；evaluate 永不抛出。
 */
export type EvaluationOutcome =
  | { readonly ok: true; readonly value: Value }
  | { readonly ok: false; readonly error: ExpressionEvalError };

/**
 * 校验结果（仅词法/语法/函数名/参数个数）。
 */
export type ExpressionValidationResult = {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<ExpressionCompileError>;
};

/**
 * 表达式引擎依赖。
 * - cacheSize：编译缓存容量，默认 EXPRESSION.DEFAULT_CACHE_SIZE
 * - now：时钟（毫秒），默认 Date.now
 * - functions：函数注册表，默认内置注册表
 */
export type ExpressionEngineDeps = {
  readonly cacheSize?: number | undefined;
  readonly now?: (() => number) | undefined;
  readonly functions?: FunctionRegistry | undefined;
  readonly logger?: Logger | undefined;
};

/**
 * 表达式引擎接口。
 */
export interface ExpressionEngine {
  /** 编译（带 LRU 缓存）；失败抛出 ExpressionCompileError */
  readonly compile: (source: string) => CompiledExpression;
  /** 求值，运行时错误以 outcome 返回 */
  readonly evaluate: (compiled: CompiledExpression, context: ExpressionContext) => EvaluationOutcome;
  /** 布尔求值：运行时错误或非布尔结果返回 false；源码编译失败时抛出 */
  readonly evaluateBoolean: (
    expression: CompiledExpression | string,
    context: ExpressionContext,
  ) => boolean;
  /** 轻量校验，不求值、不缓存 */
  readonly validate: (source: string) => ExpressionValidationResult;
  readonly getCacheStats: () => LruCacheStats;
  readonly clearCache: () => void;
  readonly hasFunction: (name: string) => boolean;
}
