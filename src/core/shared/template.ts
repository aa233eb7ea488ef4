/**
 * capability 이름 템플릿 포맷터
 *
 * {name} 형태의 자리표시자를 값으로 치환합니다. 중괄호 자체는 {{ }}로 씁니다.
 *
 * @example
 * formatTemplate('python3-{name}', { name: 'requests' }) // 'python3-requests'
 * formatTemplate('python({arch})', { arch: 'x86-64' }) // 'python(x86-64)'
 */

import { TemplateError } from './errors';

const TOKEN_PATTERN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

/**
 * 템플릿에 쓰인 자리표시자 이름 목록 (중복 제거, 등장 순서)
 */
export function templatePlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    const key = match[1];
    if (key !== undefined && !names.includes(key)) {
      names.push(key);
    }
  }
  return names;
}

export function formatTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(TOKEN_PATTERN, (token: string, key: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    if (key === undefined) {
      throw new TemplateError(template, `짝이 맞지 않는 중괄호 '${token}'`);
    }
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      throw new TemplateError(template, `값이 없는 자리표시자 {${key}}`, key);
    }
    return values[key];
  });
}
