import db from '../connection';
import type { Queryable } from '../connection';
import { v4 as uuidv4 } from 'uuid';
import type { Person } from '../../types/person';
import { toIsoString, type DbTimestamp } from '../rowValues';

const TABLE = 'persons';

interface PersonRow {
  id: string;
  name: string;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

export async function create(name: string, conn: Queryable = db): Promise<Person> {
  const now = new Date().toISOString();

  const record: PersonRow = {
    id: uuidv4(),
    name,
    created_at: now,
    updated_at: now,
  };

  await conn<PersonRow>(TABLE).insert(record);
  return mapToEntity(record);
}

export async function findById(id: string, conn: Queryable = db): Promise<Person | null> {
  const record = await conn<PersonRow>(TABLE).where({ id }).first();
  return record ? mapToEntity(record) : null;
}

export async function findByIds(ids: string[], conn: Queryable = db): Promise<Person[]> {
  if (ids.length === 0) {
    return [];
  }
  const records = await conn<PersonRow>(TABLE).whereIn('id', ids);
  return records.map(mapToEntity);
}

export async function findAll(conn: Queryable = db): Promise<Person[]> {
  const records = await conn<PersonRow>(TABLE).orderBy([
    { column: 'created_at', order: 'asc' },
    { column: 'name', order: 'asc' },
  ]);
  return records.map(mapToEntity);
}

export async function rename(id: string, name: string, conn: Queryable = db): Promise<Person | null> {
  await conn<PersonRow>(TABLE)
    .where({ id })
    .update({ name, updated_at: new Date().toISOString() });
  return findById(id, conn);
}

function mapToEntity(record: PersonRow): Person {
  return {
    id: record.id,
    name: record.name,
    createdAt: toIsoString(record.created_at),
    updatedAt: toIsoString(record.updated_at),
  };
}

export const personRepository = {
  create,
  findById,
  findByIds,
  findAll,
  rename,
};
