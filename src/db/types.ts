// TypeScript типы для БД

export interface Student {
  id: number;
  username: string;
  chat_id: number;
  first_name: string;
  last_name: string;
  login_time: string | null;
  logout_time: string | null;
}

export interface Tweet {
  id: number;
  chat_id: number;
  username: string | null;
  first_name: string;
  last_name: string;
  content: string;
  postage_date: string;
  student_id: number | null;
  admin_id: number | null;
}

export interface Admin {
  id: number;
  singleton_key: string | null;
  telegram_chat_id: number;
  username: string;
  email: string;
  role: string;
  expiration: string;
  phone_number: number;
}

export interface ApprovedRequest {
  id: number;
  chat_id: number;
  username: string;
  first_name: string;
  last_name: string;
  content: string;
  admin_id: number | null;
}

export interface StudentInput {
  username: string;
  chatId: number;
  firstName: string;
  lastName: string;
}

export interface TweetInput {
  chatId: number;
  username: string | null;
  firstName: string;
  lastName: string;
  content: string;
  postageDate: string;
  studentId?: number | null;
  adminId?: number | null;
}

export interface AdminOverrides {
  username?: string;
  role?: string;
  expiration?: string;
}

export interface ApprovedRequestInput {
  chatId: number;
  username: string;
  firstName: string;
  lastName: string;
  content: string;
  adminId?: number | null;
}

export interface StoreStats {
  students: number;
  tweets: number;
  admins: number;
  approvedRequests: number;
}
