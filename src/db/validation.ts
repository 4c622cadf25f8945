import { Ajv, type ValidateFunction } from 'ajv';
import { ValidationError } from './errors.js';
import type { ApprovedRequestInput, StudentInput, TweetInput } from './types.js';

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

const integer = {
  type: 'integer',
  minimum: Number.MIN_SAFE_INTEGER,
  maximum: Number.MAX_SAFE_INTEGER,
} as const;
const nullableId = { type: ['integer', 'null'], minimum: 1, maximum: Number.MAX_SAFE_INTEGER } as const;

function text(maxLength: number) {
  return { type: 'string', maxLength } as const;
}

const studentSchema = {
  type: 'object',
  required: ['username', 'chatId', 'firstName', 'lastName'],
  additionalProperties: false,
  properties: {
    username: text(50),
    chatId: integer,
    firstName: text(50),
    lastName: text(50),
  },
};

const tweetSchema = {
  type: 'object',
  required: ['chatId', 'username', 'firstName', 'lastName', 'content', 'postageDate'],
  additionalProperties: false,
  properties: {
    chatId: integer,
    username: { type: ['string', 'null'], maxLength: 50 },
    firstName: text(200),
    lastName: text(200),
    content: text(200),
    postageDate: text(100),
    studentId: nullableId,
    adminId: nullableId,
  },
};

const approvedRequestSchema = {
  type: 'object',
  required: ['chatId', 'username', 'firstName', 'lastName', 'content'],
  additionalProperties: false,
  properties: {
    chatId: integer,
    username: text(100),
    firstName: text(50),
    lastName: text(50),
    content: text(5000),
    adminId: nullableId,
  },
};

const validators = {
  student: ajv.compile<StudentInput>(studentSchema),
  tweet: ajv.compile<TweetInput>(tweetSchema),
  approvedRequest: ajv.compile<ApprovedRequestInput>(approvedRequestSchema),
};

export type EntityKind = keyof typeof validators;

function check<T>(validator: ValidateFunction<T>, kind: EntityKind, data: unknown): T {
  if (validator(data)) return data;
  const details = (validator.errors || []).map(
    e => `${e.instancePath || '/'}: ${e.message || 'validation error'}`,
  );
  throw new ValidationError(`Invalid ${kind}: ${details.join('; ')}`, details);
}

export function validateStudentInput(data: unknown): StudentInput {
  return check(validators.student, 'student', data);
}

export function validateTweetInput(data: unknown): TweetInput {
  return check(validators.tweet, 'tweet', data);
}

export function validateApprovedRequestInput(data: unknown): ApprovedRequestInput {
  return check(validators.approvedRequest, 'approvedRequest', data);
}
