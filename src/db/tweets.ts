import { withUnitOfWork } from './unit-of-work.js';
import { validateTweetInput } from './validation.js';
import type { Tweet, TweetInput } from './types.js';

type TweetRow = [number, string | null, string, string, string, string, number | null, number | null];

/**
 * Сохранить твит. Без проверки на дубли; несуществующий student_id/admin_id
 * отклоняется внешним ключом.
 */
export function createTweet(input: TweetInput): Tweet {
  const params = validateTweetInput(input);

  return withUnitOfWork(db => {
    const stmt = db.prepare<TweetRow>(`
      INSERT INTO tweets (chat_id, username, first_name, last_name, content, postage_date, student_id, admin_id)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const result = stmt.run(
      params.chatId,
      params.username,
      params.firstName,
      params.lastName,
      params.content,
      params.postageDate,
      params.studentId ?? null,
      params.adminId ?? null,
    );
    const tweet = db
      .prepare<[number | bigint], Tweet>('SELECT * FROM tweets WHERE id = ?')
      .get(result.lastInsertRowid);
    if (!tweet) {
      throw new Error(`Tweet ${result.lastInsertRowid} not found right after insert`);
    }
    console.log(`[Store] Tweet saved: ID=${tweet.id}, chat=${tweet.chat_id}`);
    return tweet;
  });
}

/**
 * Твиты, у которых все четыре поля совпадают точно. username сравнивается через IS,
 * так что null находит только твиты без username.
 */
export function findTweetsByUser(
  chatId: number,
  username: string | null,
  firstName: string,
  lastName: string,
): Tweet[] {
  return withUnitOfWork(db => {
    const stmt = db.prepare<[number, string | null, string, string], Tweet>(`
      SELECT * FROM tweets
      WHERE chat_id = ? AND username IS ? AND first_name = ? AND last_name = ?
      ORDER BY id ASC
    `);
    return stmt.all(chatId, username, firstName, lastName);
  });
}

export function getLatestTweet(): Tweet | null {
  return withUnitOfWork(db => {
    const stmt = db.prepare<[], Tweet>('SELECT * FROM tweets ORDER BY id DESC LIMIT 1');
    return stmt.get() ?? null;
  });
}

export function listAdminTweets(adminId: number): Tweet[] {
  return withUnitOfWork(db =>
    db.prepare<[number], Tweet>('SELECT * FROM tweets WHERE admin_id = ? ORDER BY id ASC').all(adminId),
  );
}
