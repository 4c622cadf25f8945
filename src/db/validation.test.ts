import { test } from 'node:test';
import assert from 'node:assert';
import { validateApprovedRequestInput, validateStudentInput, validateTweetInput } from './validation.js';
import { ValidationError } from './errors.js';

function detailsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.details;
    throw err;
  }
  assert.fail('expected a ValidationError');
}

test('validateStudentInput accepts names at the 50-character limit', () => {
  const input = { username: 'u'.repeat(50), chatId: 1, firstName: 'f'.repeat(50), lastName: 'l'.repeat(50) };
  assert.deepStrictEqual(validateStudentInput(input), input);
});

test('validateStudentInput reports every violation', () => {
  const details = detailsOf(() =>
    validateStudentInput({ username: 'alice', chatId: 1.5, firstName: 'f'.repeat(51), lastName: 'L' }),
  );
  assert.deepStrictEqual(details, [
    '/chatId: must be integer',
    '/firstName: must NOT have more than 50 characters',
  ]);
});

test('validateStudentInput rejects chat ids beyond the safe integer range', () => {
  const base = { username: 'alice', firstName: 'A', lastName: 'L' };

  assert.strictEqual(validateStudentInput({ ...base, chatId: Number.MAX_SAFE_INTEGER }).chatId, Number.MAX_SAFE_INTEGER);
  assert.deepStrictEqual(detailsOf(() => validateStudentInput({ ...base, chatId: 2 ** 53 })), [
    '/chatId: must be <= 9007199254740991',
  ]);
  assert.deepStrictEqual(detailsOf(() => validateStudentInput({ ...base, chatId: -(2 ** 53) })), [
    '/chatId: must be >= -9007199254740991',
  ]);
});

test('validateStudentInput rejects unknown fields', () => {
  const details = detailsOf(() =>
    validateStudentInput({ username: 'alice', chatId: 1, firstName: 'A', lastName: 'L', role: 'x' }),
  );
  assert.deepStrictEqual(details, ['/: must NOT have additional properties']);
});

test('validateTweetInput allows a null username and owner ids', () => {
  const input = {
    chatId: 1,
    username: null,
    firstName: 'A',
    lastName: 'L',
    content: 'hi',
    postageDate: '2026-03-01',
    studentId: null,
    adminId: 3,
  };
  assert.deepStrictEqual(validateTweetInput(input), input);
});

test('validateTweetInput limits username to 50 and names to 200 characters', () => {
  const details = detailsOf(() =>
    validateTweetInput({
      chatId: 1,
      username: 'u'.repeat(51),
      firstName: 'f'.repeat(200),
      lastName: 'l'.repeat(201),
      content: 'hi',
      postageDate: '2026-03-01',
    }),
  );
  assert.deepStrictEqual(details, [
    '/username: must NOT have more than 50 characters',
    '/lastName: must NOT have more than 200 characters',
  ]);
});

test('validateApprovedRequestInput reports missing fields', () => {
  assert.deepStrictEqual(
    detailsOf(() => validateApprovedRequestInput({ chatId: 1, username: 'alice', firstName: 'A', lastName: 'L' })),
    ["/: must have required property 'content'"],
  );
});
