import { withUnitOfWork } from './unit-of-work.js';
import { validateStudentInput } from './validation.js';
import type { Student, StudentInput, Tweet } from './types.js';

/**
 * Найти студента по chat_id или зарегистрировать нового.
 * Существующая запись возвращается без изменений, даже если имя или username отличаются.
 */
export function createOrGetStudent(input: StudentInput, now: Date = new Date()): Student {
  const params = validateStudentInput(input);

  return withUnitOfWork(db => {
    const insert = db.prepare<[string, number, string, string, string]>(`
      INSERT INTO students (username, chat_id, first_name, last_name, login_time)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(chat_id) DO NOTHING
    `);
    const info = insert.run(params.username, params.chatId, params.firstName, params.lastName, now.toISOString());

    const student = db
      .prepare<[number], Student>('SELECT * FROM students WHERE chat_id = ?')
      .get(params.chatId);
    if (!student) {
      throw new Error(`Student row for chat ${params.chatId} vanished inside its transaction`);
    }

    if (info.changes > 0) {
      console.log(`[Store] Student registered: ID=${student.id}, chat=${student.chat_id}`);
    }
    return student;
  });
}

export function getStudentByChatId(chatId: number): Student | null {
  return withUnitOfWork(db => {
    const stmt = db.prepare<[number], Student>('SELECT * FROM students WHERE chat_id = ?');
    return stmt.get(chatId) ?? null;
  });
}

/**
 * Отметить выход. Повторный вызов перезаписывает logout_time.
 * logout_time обновляется и в переданном объекте. Возвращает свежую строку
 * или null, если строки студента уже нет (тогда объект не меняется).
 */
export function recordLogout(
  student: { id: number; logout_time?: string | null },
  now: Date = new Date(),
): Student | null {
  return withUnitOfWork(db => {
    const info = db
      .prepare<[string, number]>('UPDATE students SET logout_time = ? WHERE id = ?')
      .run(now.toISOString(), student.id);
    if (info.changes === 0) {
      console.warn(`[Store] Logout for unknown student ID=${student.id}`);
      return null;
    }
    const updated = db.prepare<[number], Student>('SELECT * FROM students WHERE id = ?').get(student.id) ?? null;
    if (updated) student.logout_time = updated.logout_time;
    return updated;
  });
}

export function listStudentTweets(studentId: number): Tweet[] {
  return withUnitOfWork(db =>
    db.prepare<[number], Tweet>('SELECT * FROM tweets WHERE student_id = ? ORDER BY id ASC').all(studentId),
  );
}
