/**
 * Best-effort structural reader for write outcomes of unknown type
 * Each member is read through its accessor method first, then as a plain property.
 * A missing member reads as undefined. A member that throws on access or has the
 * wrong type also reads as undefined, and an outcome additionally lists it as broken.
 */

import { z } from 'zod';

export interface ProbedError {
  fields?: string[];
  message?: string;
  statusCode?: string;
}

export type OutcomeMember = 'success' | 'id' | 'errors';

export interface ProbedOutcome {
  /** False when none of success, id or errors could be read */
  readable: boolean;
  /** Members that are present but threw or held a value of the wrong type */
  brokenMembers: OutcomeMember[];
  success?: boolean;
  id?: string;
  errors?: ProbedError[];
}

type MemberRead<T> =
  | { status: 'absent' }
  | { status: 'broken' }
  | { status: 'read'; value: T };

const successSchema = z.boolean();
const idSchema = z.union([z.string(), z.number().finite().transform(String)]);
const errorListSchema = z.array(z.unknown());
const fieldsSchema = z.array(z.string());
const textSchema = z.string();

function readMember<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  target: object,
  accessor: string,
  ...properties: string[]
): MemberRead<T> {
  let value: unknown;
  try {
    const member: unknown = Reflect.get(target, accessor);
    if (typeof member === 'function') {
      value = Reflect.apply(member, target, []);
    } else {
      value = properties
        .map(property => Reflect.get(target, property))
        .find(candidate => candidate !== undefined && candidate !== null);
      if (value === undefined) {
        return { status: 'absent' };
      }
    }
  } catch {
    return { status: 'broken' };
  }

  const parsed = schema.safeParse(value);
  return parsed.success ? { status: 'read', value: parsed.data } : { status: 'broken' };
}

function valueOf<T>(read: MemberRead<T>): T | undefined {
  return read.status === 'read' ? read.value : undefined;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

export function probeError(raw: unknown): ProbedError {
  if (typeof raw === 'string') {
    return { message: raw };
  }
  if (!isObjectLike(raw)) {
    return {};
  }

  return {
    fields: valueOf(readMember(fieldsSchema, raw, 'getFields', 'fields')),
    message: valueOf(readMember(textSchema, raw, 'getMessage', 'message')),
    statusCode: valueOf(readMember(textSchema, raw, 'getStatusCode', 'statusCode', 'code')),
  };
}

export function probeOutcome(raw: unknown): ProbedOutcome {
  if (!isObjectLike(raw)) {
    return { readable: false, brokenMembers: [] };
  }

  const reads = {
    success: readMember(successSchema, raw, 'isSuccess', 'success'),
    id: readMember(idSchema, raw, 'getId', 'id'),
    errors: readMember(errorListSchema, raw, 'getErrors', 'errors'),
  };
  const members: OutcomeMember[] = ['success', 'id', 'errors'];

  return {
    readable: members.some(member => reads[member].status === 'read'),
    brokenMembers: members.filter(member => reads[member].status === 'broken'),
    success: valueOf(reads.success),
    id: valueOf(reads.id),
    errors: valueOf(reads.errors)?.map(probeError),
  };
}
