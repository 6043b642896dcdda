/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: FTN-{category}{3-digit} (e.g., FTN-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
  byCategory(category: ErrorCategory): ErrorDefinition[];
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }

  byCategory(category: ErrorCategory): ErrorDefinition[] {
    return [...this.byId.values()].filter((def) => def.category === category);
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (FTN-L0xx)
  {
    errorId: 'FTN-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string',
    cause:
      'String opened with a quote but not closed before the end of the line or file.',
    resolution:
      'Add the matching closing quote. Strings cannot span multiple lines.',
    examples: [
      { description: 'Missing closing quote', code: 'print "hello' },
      { description: 'Newline inside string', code: "x = 'one\ntwo'" },
    ],
  },
  {
    errorId: 'FTN-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: "Unexpected character '{char}'",
    cause: 'Character is not part of any Fountain token.',
    resolution:
      'Remove or replace the character. Comments start with -- rather than # or //.',
    examples: [
      { description: 'Hash comment', code: '# not a comment' },
      { description: 'Modulo operator', code: 'x = 7 % 2' },
    ],
  },

  // Parse Errors (FTN-P0xx)
  {
    errorId: 'FTN-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: "Unexpected token '{token}'",
    cause: 'A token appeared where no expression or statement can start.',
    resolution: 'Check for a missing operand or a stray keyword.',
    examples: [{ description: 'Dangling operator', code: 'x = 1 +' }],
  },
  {
    errorId: 'FTN-P002',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Cannot assign to {target}',
    cause:
      'The left side of an assignment is not a variable, index or field access.',
    resolution: 'Assign to a name, t[key] or t.name.',
    examples: [{ description: 'Assigning to a call', code: 'f() = 1' }],
  },
  {
    errorId: 'FTN-P003',
    category: 'parse',
    description: 'Positional argument after named',
    messageTemplate: 'Positional argument follows named argument',
    cause: 'A call lists a positional argument after a name = value argument.',
    resolution: 'Move all positional arguments before the named ones.',
    examples: [{ description: 'Named then positional', code: 'f(y = 5, 1)' }],
  },
  {
    errorId: 'FTN-P004',
    category: 'parse',
    description: 'Invalid parameter list',
    messageTemplate: '{reason}',
    cause:
      'A parameter without a default follows one with a default, or a name repeats.',
    resolution:
      'List required parameters first and give every parameter a distinct name.',
    examples: [
      { description: 'Default before required', code: 'fn f(x = 1, y) end' },
      { description: 'Duplicate name', code: 'fn f(a, a) end' },
    ],
  },
  {
    errorId: 'FTN-P005',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expected {expected}',
    cause: 'A required token such as end, do or a closing bracket is missing.',
    resolution: 'Add the missing token.',
    examples: [{ description: 'Missing end', code: 'if x do print x' }],
  },
  {
    errorId: 'FTN-P006',
    category: 'parse',
    description: 'Too many arguments or parameters',
    messageTemplate: 'Cannot have more than {limit} {kind}',
    cause: 'A call or declaration exceeds the argument limit.',
    resolution: 'Pass a table instead of many separate values.',
  },
  {
    errorId: 'FTN-P007',
    category: 'parse',
    description: 'Control statement out of place',
    messageTemplate: "'{keyword}' outside {construct}",
    cause:
      'break or continue appears outside any for loop of its function, or return appears outside any function.',
    resolution:
      'Use break and continue inside for ... end, and return inside fn ... end.',
    examples: [
      { description: 'Top-level break', code: 'break' },
      { description: 'Top-level return', code: 'return 1' },
      { description: 'Break in a function body', code: 'for do fn f() break end end' },
    ],
  },
  {
    errorId: 'FTN-P008',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Maximum nesting depth exceeded ({limit})',
    cause: 'Blocks or expressions are nested more deeply than the parser allows.',
    resolution: 'Split deeply nested code into functions or variables.',
  },

  // Runtime Errors (FTN-R0xx)
  {
    errorId: 'FTN-R001',
    category: 'runtime',
    description: 'Operand type mismatch',
    messageTemplate: "Unsupported operand type(s) for '{operator}': {types}",
    cause:
      'Arithmetic and ordering operators accept numbers only; unary minus too.',
    resolution:
      'Check operand types with type(). Strings are not converted to numbers.',
    examples: [{ description: 'Adding a string', code: 'x = 1 + "2"' }],
  },
  {
    errorId: 'FTN-R002',
    category: 'runtime',
    description: 'Value is not callable',
    messageTemplate: 'Can only call functions, got {type}',
    cause: 'The callee of a call expression is not a function.',
    resolution: 'Call a function value, or check the name for typos.',
    examples: [{ description: 'Calling a number', code: 'x = 1\nx()' }],
  },
  {
    errorId: 'FTN-R003',
    category: 'runtime',
    description: 'Value is not indexable',
    messageTemplate: 'Cannot index {type}',
    cause: 'Indexing or field access on a value that is not a table.',
    resolution: 'Index tables only.',
    examples: [{ description: 'Field of nil', code: 'x = nil\nprint x.y' }],
  },
  {
    errorId: 'FTN-R004',
    category: 'runtime',
    description: 'Argument binding failed',
    messageTemplate: '{function}() {detail}',
    cause:
      'Arguments do not match the parameters: too many, unknown names, duplicates, or missing required values.',
    resolution: 'Compare the call against the function declaration.',
    examples: [
      { description: 'Missing argument', code: 'fn f(x) end\nf()' },
      { description: 'Unknown name', code: 'fn f(x) end\nf(z = 1)' },
    ],
  },
  {
    errorId: 'FTN-R005',
    category: 'runtime',
    description: 'Undefined name',
    messageTemplate: "Undefined variable '{name}'",
    cause: 'A name is read before anything has been assigned to it.',
    resolution: 'Assign the name first, or check its spelling.',
    examples: [{ description: 'Typo', code: 'count = 1\nprint coutn' }],
  },
  {
    errorId: 'FTN-R006',
    category: 'runtime',
    description: 'Assertion failed',
    messageTemplate: '{message}',
    cause: 'The condition of an assert statement was falsy.',
    resolution: 'Fix the condition or the data it checks.',
    examples: [{ description: 'Failing assert', code: 'assert 1 > 2, "bad"' }],
  },
  {
    errorId: 'FTN-R007',
    category: 'runtime',
    description: 'Loop control outside a loop',
    messageTemplate: "'{keyword}' outside loop",
    cause:
      'break or continue reached a function boundary or the top level without an enclosing for loop. The parser rejects such code, so this arises only from syntax trees built by hand.',
    resolution: 'Use break and continue inside for ... end only.',
  },
  {
    errorId: 'FTN-R008',
    category: 'runtime',
    description: 'Invalid host function',
    messageTemplate: "Host function '{function}': {reason}",
    cause: 'A host function definition has an invalid parameter list.',
    resolution:
      'Give parameters distinct names and put defaulted parameters last.',
  },
  {
    errorId: 'FTN-R010',
    category: 'runtime',
    description: 'Call depth exceeded',
    messageTemplate: 'Maximum call depth exceeded ({limit})',
    cause: 'Function calls nested deeper than the configured limit.',
    resolution:
      'Check recursion for a missing base case, or raise maxCallDepth.',
    examples: [
      { description: 'Unbounded recursion', code: 'fn f() return f() end\nf()' },
    ],
  },
  {
    errorId: 'FTN-R011',
    category: 'runtime',
    description: 'Loop iteration limit exceeded',
    messageTemplate: 'Loop exceeded {limit} iterations',
    cause: 'A for loop ran more iterations than maxLoopIterations allows.',
    resolution: 'Check the loop exit condition, or raise the limit.',
    examples: [{ description: 'Missing break', code: 'for do end' }],
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} tokens with context values.
 *
 * Missing context keys render as the empty string. `{{` is copied through
 * unchanged, and an unclosed brace returns the template as-is.
 *
 * @example
 * renderMessage("Undefined variable '{name}'", { name: "x" })
 * // Returns: "Undefined variable 'x'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
