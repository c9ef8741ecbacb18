import { readFileSync } from 'node:fs';
import type { z } from 'zod';
import { EntityTablesSchema, StateTableSchema } from '../schemas/index.js';

export type EntityTables = z.infer<typeof EntityTablesSchema>;
export type StateTable = z.infer<typeof StateTableSchema>;

const dataDir = new URL('../../data/', import.meta.url);

let entityTables: EntityTables | null = null;
let stateTable: StateTable | null = null;

function readJson(name: string): unknown {
  return JSON.parse(readFileSync(new URL(name, dataDir), 'utf-8'));
}

export function getEntityTables(): EntityTables {
  if (!entityTables) {
    entityTables = EntityTablesSchema.parse(readJson('entity-types.json'));
  }
  return entityTables;
}

export function getStateTable(): StateTable {
  if (!stateTable) {
    stateTable = StateTableSchema.parse(readJson('states.json'));
  }
  return stateTable;
}
