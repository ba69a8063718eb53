import db from '../connection';
import type { Queryable } from '../connection';
import { v4 as uuidv4 } from 'uuid';
import { toIsoString, type DbTimestamp } from '../rowValues';

export type AuditEntityType = 'person' | 'transaction' | 'bet';
export type AuditAction = 'CREATE' | 'RENAME' | 'UPDATE_LEGS' | 'SETTLE';

export interface AuditLogEntry {
  id: string;
  entityType: AuditEntityType;
  entityId: string;
  action: AuditAction;
  payload: Record<string, unknown> | null;
  timestamp: string;
}

export interface CreateAuditLogInput {
  entityType: AuditEntityType;
  entityId: string;
  action: AuditAction;
  payload?: Record<string, unknown>;
}

interface AuditLogRow {
  id: string;
  entity_type: AuditEntityType;
  entity_id: string;
  action: AuditAction;
  payload: string | Record<string, unknown> | null;
  timestamp: DbTimestamp;
}

const TABLE = 'audit_logs';

export async function append(
  input: CreateAuditLogInput,
  conn: Queryable = db
): Promise<AuditLogEntry> {
  const record: AuditLogRow = {
    id: uuidv4(),
    entity_type: input.entityType,
    entity_id: input.entityId,
    action: input.action,
    payload: input.payload ? JSON.stringify(input.payload) : null,
    timestamp: new Date().toISOString(),
  };

  await conn<AuditLogRow>(TABLE).insert(record);
  return mapToEntity(record);
}

export async function findByEntity(
  entityType: AuditEntityType,
  entityId: string,
  conn: Queryable = db
): Promise<AuditLogEntry[]> {
  const records = await conn<AuditLogRow>(TABLE)
    .where({ entity_type: entityType, entity_id: entityId })
    .orderBy('timestamp', 'asc');
  return records.map(mapToEntity);
}

function parsePayload(payload: AuditLogRow['payload']): Record<string, unknown> | null {
  if (payload === null) {
    return null;
  }
  if (typeof payload !== 'string') {
    return payload;
  }
  const parsed: unknown = JSON.parse(payload);
  return isRecord(parsed) ? parsed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapToEntity(record: AuditLogRow): AuditLogEntry {
  return {
    id: record.id,
    entityType: record.entity_type,
    entityId: record.entity_id,
    action: record.action,
    payload: parsePayload(record.payload),
    timestamp: toIsoString(record.timestamp),
  };
}

export const auditLogRepository = {
  append,
  findByEntity,
};
