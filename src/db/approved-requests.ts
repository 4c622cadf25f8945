import { withUnitOfWork } from './unit-of-work.js';
import { validateApprovedRequestInput } from './validation.js';
import type { ApprovedRequest, ApprovedRequestInput } from './types.js';

type ApprovedRequestRow = [number, string, string, string, string, number | null];

export function createApprovedRequest(input: ApprovedRequestInput): ApprovedRequest {
  const params = validateApprovedRequestInput(input);

  return withUnitOfWork(db => {
    const stmt = db.prepare<ApprovedRequestRow>(`
      INSERT INTO approved_requests (chat_id, username, first_name, last_name, content, admin_id)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const result = stmt.run(
      params.chatId,
      params.username,
      params.firstName,
      params.lastName,
      params.content,
      params.adminId ?? null,
    );
    const request = db
      .prepare<[number | bigint], ApprovedRequest>('SELECT * FROM approved_requests WHERE id = ?')
      .get(result.lastInsertRowid);
    if (!request) {
      throw new Error(`Approved request ${result.lastInsertRowid} not found right after insert`);
    }
    console.log(`[Store] Approved request saved: ID=${request.id}, chat=${request.chat_id}`);
    return request;
  });
}
