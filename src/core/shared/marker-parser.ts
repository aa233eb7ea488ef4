/**
 * PEP 508 환경 마커 파서
 *
 * 문법:
 *   marker     = or_expr
 *   or_expr    = and_expr ('or' and_expr)*
 *   and_expr   = atom ('and' atom)*
 *   atom       = '(' marker ')' | value op value
 *   op         = '<' | '<=' | '!=' | '==' | '>=' | '>' | '~=' | '===' | 'in' | 'not' 'in'
 *
 * and가 or보다 먼저 결합하며, 같은 연산자끼리는 왼쪽부터 결합합니다.
 */

import { InvalidMarkerError } from './errors';
import { isSpecifierOperator, type SpecifierOperator } from './specifier';

export type MarkerOperator = SpecifierOperator | 'in' | 'not in';

/**
 * 비교 노드. 변수가 오른쪽에 있었으면 reversed = true
 * (예: "3.4" < python_version)
 */
export interface MarkerComparison {
  type: 'comparison';
  variable: string;
  operator: MarkerOperator;
  literal: string;
  reversed: boolean;
}

export interface MarkerBinary {
  type: 'and' | 'or';
  left: MarkerExpression;
  right: MarkerExpression;
}

export type MarkerExpression = MarkerComparison | MarkerBinary;

// 구버전 변수명 호환 (setuptools/pkg_resources 시절 표기)
const LEGACY_VARIABLE_ALIASES = new Map<string, string>([
  ['os.name', 'os_name'],
  ['sys.platform', 'sys_platform'],
  ['platform.version', 'platform_version'],
  ['platform.machine', 'platform_machine'],
  ['platform.python_implementation', 'platform_python_implementation'],
  ['python_implementation', 'platform_python_implementation'],
]);

type TokenKind = 'lparen' | 'rparen' | 'string' | 'identifier' | 'operator' | 'and' | 'or' | 'in' | 'not' | 'end';

interface Token {
  kind: TokenKind;
  value: string;
  position: number;
}

const OPERATOR_PATTERN = /^(===|==|!=|<=|>=|~=|<|>)/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*/;
const KEYWORDS = new Map<string, TokenKind>([
  ['and', 'and'],
  ['or', 'or'],
  ['in', 'in'],
  ['not', 'not'],
]);

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ kind: ch === '(' ? 'lparen' : 'rparen', value: ch, position: pos });
      pos++;
      continue;
    }

    // 문자열: 이스케이프 없음, 같은 종류의 따옴표로 닫힘
    if (ch === '"' || ch === "'") {
      const end = text.indexOf(ch, pos + 1);
      if (end === -1) {
        throw new InvalidMarkerError(text, '닫히지 않은 문자열', pos);
      }
      tokens.push({ kind: 'string', value: text.slice(pos + 1, end), position: pos });
      pos = end + 1;
      continue;
    }

    const rest = text.slice(pos);
    const operator = OPERATOR_PATTERN.exec(rest);
    if (operator) {
      tokens.push({ kind: 'operator', value: operator[0], position: pos });
      pos += operator[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      const word = identifier[0];
      tokens.push({ kind: KEYWORDS.get(word) ?? 'identifier', value: word, position: pos });
      pos += word.length;
      continue;
    }

    throw new InvalidMarkerError(text, `예상치 못한 문자 '${ch}'`, pos);
  }

  tokens.push({ kind: 'end', value: '', position: text.length });
  return tokens;
}

class MarkerParser {
  private tokens: Token[];
  private index = 0;

  constructor(private readonly text: string) {
    this.tokens = tokenize(text);
  }

  parse(): MarkerExpression {
    const expression = this.parseOr();
    const token = this.peek();
    if (token.kind !== 'end') {
      this.fail(`예상치 못한 토큰 '${token.value}'`, token);
    }
    return expression;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.kind !== 'end') this.index++;
    return token;
  }

  private fail(detail: string, token: Token): never {
    throw new InvalidMarkerError(this.text, detail, token.position);
  }

  private parseOr(): MarkerExpression {
    let left = this.parseAnd();
    while (this.peek().kind === 'or') {
      this.next();
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): MarkerExpression {
    let left = this.parseAtom();
    while (this.peek().kind === 'and') {
      this.next();
      left = { type: 'and', left, right: this.parseAtom() };
    }
    return left;
  }

  private parseAtom(): MarkerExpression {
    if (this.peek().kind === 'lparen') {
      this.next();
      const inner = this.parseOr();
      const closing = this.next();
      if (closing.kind !== 'rparen') {
        this.fail("')'가 필요합니다", closing);
      }
      return inner;
    }
    return this.parseComparison();
  }

  private parseValue(): Token {
    const token = this.next();
    if (token.kind !== 'string' && token.kind !== 'identifier') {
      this.fail(token.kind === 'end' ? '식이 끝났습니다' : `값이 필요합니다: '${token.value}'`, token);
    }
    return token;
  }

  private parseOperator(): MarkerOperator {
    const token = this.next();
    switch (token.kind) {
      case 'in':
        return 'in';
      case 'not': {
        const following = this.next();
        if (following.kind !== 'in') {
          this.fail("'not' 뒤에는 'in'이 와야 합니다", following);
        }
        return 'not in';
      }
      case 'operator':
        if (isSpecifierOperator(token.value)) {
          return token.value;
        }
        break;
    }
    return this.fail(`비교 연산자가 필요합니다: '${token.value}'`, token);
  }

  private parseComparison(): MarkerComparison {
    const lhs = this.parseValue();
    const operator = this.parseOperator();
    const rhs = this.parseValue();

    if (lhs.kind === rhs.kind) {
      this.fail(
        lhs.kind === 'string' ? '비교 대상 중 하나는 변수여야 합니다' : '변수끼리는 비교할 수 없습니다',
        lhs
      );
    }

    const reversed = lhs.kind === 'string';
    const variable = reversed ? rhs.value : lhs.value;
    return {
      type: 'comparison',
      variable: LEGACY_VARIABLE_ALIASES.get(variable) ?? variable,
      operator,
      literal: reversed ? lhs.value : rhs.value,
      reversed,
    };
  }
}

/**
 * 마커 문자열을 식 트리로 파싱
 *
 * @example
 * parseMarker('os_name == "nt" and extra == "test"')
 * // { type: 'and', left: {...os_name...}, right: {...extra...} }
 * @throws InvalidMarkerError 문법 오류
 */
export function parseMarker(text: string): MarkerExpression {
  return new MarkerParser(text).parse();
}

/**
 * 식 트리를 다시 마커 문자열로 변환 (로그/디버깅용)
 */
export function formatMarker(expression: MarkerExpression): string {
  if (expression.type === 'comparison') {
    const literal = `"${expression.literal}"`;
    return expression.reversed
      ? `${literal} ${expression.operator} ${expression.variable}`
      : `${expression.variable} ${expression.operator} ${literal}`;
  }

  const wrap = (child: MarkerExpression): string =>
    expression.type === 'and' && child.type === 'or' ? `(${formatMarker(child)})` : formatMarker(child);

  return `${wrap(expression.left)} ${expression.type} ${wrap(expression.right)}`;
}
