import { z } from 'zod';

/**
 * A named JSON document on disk: its file, the schema every load must pass,
 * and the value a missing file stands for.
 */
export interface StoreDefinition<T> {
  id: string;
  fileName: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  empty: () => T;
}

export function defineStore<T>(definition: StoreDefinition<T>): StoreDefinition<T> {
  return definition;
}
