import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { closeDatabase, initDatabase } from './database.js';
import { createOrGetStudent, getStudentByChatId, listStudentTweets, recordLogout } from './students.js';
import { createTweet } from './tweets.js';
import { getStoreStats } from './stats.js';
import { ValidationError } from './errors.js';

const LOGIN = new Date('2026-03-01T10:00:00.000Z');

describe('students', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('registers a new student with login_time and no logout_time', () => {
    const student = createOrGetStudent(
      { username: 'alice', chatId: 100, firstName: 'A', lastName: 'L' },
      LOGIN,
    );

    assert.strictEqual(student.id, 1);
    assert.strictEqual(student.username, 'alice');
    assert.strictEqual(student.chat_id, 100);
    assert.strictEqual(student.first_name, 'A');
    assert.strictEqual(student.last_name, 'L');
    assert.strictEqual(student.login_time, '2026-03-01T10:00:00.000Z');
    assert.strictEqual(student.logout_time, null);
  });

  it('returns the stored student unchanged for a known chat_id', () => {
    const first = createOrGetStudent({ username: 'alice', chatId: 100, firstName: 'A', lastName: 'L' }, LOGIN);
    const second = createOrGetStudent(
      { username: 'alice_renamed', chatId: 100, firstName: 'Alice', lastName: 'Lee' },
      new Date('2026-03-02T10:00:00.000Z'),
    );

    assert.strictEqual(second.id, first.id);
    assert.strictEqual(second.username, 'alice');
    assert.strictEqual(second.first_name, 'A');
    assert.strictEqual(second.login_time, '2026-03-01T10:00:00.000Z');
    assert.strictEqual(getStoreStats().students, 1);
  });

  it('getStudentByChatId returns null for an unknown chat', () => {
    assert.strictEqual(getStudentByChatId(404), null);
  });

  it('getStudentByChatId finds a registered student', () => {
    const created = createOrGetStudent({ username: 'bob', chatId: 200, firstName: 'B', lastName: 'M' }, LOGIN);
    const found = getStudentByChatId(200);
    assert.deepStrictEqual(found, created);
  });

  it('recordLogout overwrites logout_time on every call', () => {
    const student = createOrGetStudent({ username: 'alice', chatId: 100, firstName: 'A', lastName: 'L' }, LOGIN);

    const firstLogout = recordLogout(student, new Date('2026-03-01T12:00:00.000Z'));
    const secondLogout = recordLogout(student, new Date('2026-03-01T13:30:00.000Z'));

    assert.strictEqual(firstLogout?.logout_time, '2026-03-01T12:00:00.000Z');
    assert.strictEqual(secondLogout?.logout_time, '2026-03-01T13:30:00.000Z');
    assert.strictEqual(getStudentByChatId(100)?.logout_time, '2026-03-01T13:30:00.000Z');
  });

  it('recordLogout also sets logout_time on the student passed in', () => {
    const student = createOrGetStudent({ username: 'alice', chatId: 100, firstName: 'A', lastName: 'L' }, LOGIN);
    assert.strictEqual(student.logout_time, null);

    recordLogout(student, new Date('2026-03-01T12:00:00.000Z'));

    assert.strictEqual(student.logout_time, '2026-03-01T12:00:00.000Z');
  });

  it('recordLogout leaves the object untouched when the row is missing', () => {
    const ghost = { id: 42, logout_time: null };
    recordLogout(ghost, new Date('2026-03-01T12:00:00.000Z'));
    assert.strictEqual(ghost.logout_time, null);
  });

  it('recordLogout with the default clock stores a timestamp not before the previous one', () => {
    const student = createOrGetStudent({ username: 'alice', chatId: 100, firstName: 'A', lastName: 'L' });
    const first = recordLogout(student)?.logout_time ?? '';
    const second = recordLogout(student)?.logout_time ?? '';

    assert.notStrictEqual(first, '');
    assert.ok(second >= first);
  });

  it('recordLogout returns null for a student row that does not exist', () => {
    assert.strictEqual(recordLogout({ id: 42 }), null);
  });

  it('rejects a username longer than 50 characters', () => {
    assert.throws(
      () => createOrGetStudent({ username: 'u'.repeat(51), chatId: 100, firstName: 'A', lastName: 'L' }),
      (err: unknown) => {
        assert.ok(err instanceof ValidationError);
        assert.deepStrictEqual(err.details, ['/username: must NOT have more than 50 characters']);
        return true;
      },
    );
    assert.strictEqual(getStoreStats().students, 0);
  });

  it('listStudentTweets returns only the tweets linked to the student', () => {
    const student = createOrGetStudent({ username: 'alice', chatId: 100, firstName: 'A', lastName: 'L' }, LOGIN);
    const linked = createTweet({
      chatId: 100,
      username: 'alice',
      firstName: 'A',
      lastName: 'L',
      content: 'linked',
      postageDate: '2026-03-01 10:05',
      studentId: student.id,
    });
    createTweet({
      chatId: 100,
      username: 'alice',
      firstName: 'A',
      lastName: 'L',
      content: 'not linked',
      postageDate: '2026-03-01 10:06',
    });

    const tweets = listStudentTweets(student.id);
    assert.deepStrictEqual(tweets.map(t => t.id), [linked.id]);
  });
});
