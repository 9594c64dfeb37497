import test from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../config';
import { ValidationError } from '../errors';
import { checkCode, isValidCode } from '../naptan';

const config = loadConfig({});

test('accepts 8 digit codes', () => {
  for (const code of ['22001688', '00000000', '45019999']) {
    assert.equal(isValidCode(code, config), true, code);
    assert.equal(checkCode(code, config), code);
  }
});

test('rejects codes of the wrong length', () => {
  for (const code of ['', '1234567', '123456789']) {
    assert.equal(isValidCode(code, config), false, code);
  }
});

test('rejects letters, punctuation and spaces', () => {
  for (const code of ['1234567a', '1234-678', '1234 678', 'ABCDEFGH', '1234.678']) {
    assert.equal(isValidCode(code, config), false, code);
  }
});

test('rejects digits outside ASCII', () => {
  assert.equal(isValidCode('１２３４５６７８', config), false);
});

test('checkCode throws a ValidationError with the user facing message', () => {
  assert.throws(
    () => checkCode('1234567', config),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.code === '1234567' &&
      error.message === 'NapTAN code must be an 8 digit number.',
  );
});
