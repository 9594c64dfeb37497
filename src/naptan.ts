import type { AppConfig } from './config';
import { ValidationError } from './errors';

type CodeRules = Pick<AppConfig, 'codeLength' | 'denyList'>;

export function isValidCode(code: string, rules: CodeRules): boolean {
  if (code.length !== rules.codeLength) return false;
  if ([...code].some((char) => rules.denyList.includes(char))) return false;
  return /^[0-9]+$/.test(code);
}

export function checkCode(code: string, rules: CodeRules): string {
  if (!isValidCode(code, rules)) {
    throw new ValidationError(code);
  }
  return code;
}
