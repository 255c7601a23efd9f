import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { PersistenceError, describeError, hasErrorCode } from '../common/errors/wallet.errors';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { StoreDefinition } from './store-definition';

/**
 * JSON document stores under the data directory.
 *
 * Commits are crash-atomic: the document is written to a unique temp file
 * beside the target, fsynced, then renamed over it, so a reader only ever sees
 * the previous or the new complete document. Writers of one store are
 * serialized by a per-store mutex; loads take no lock.
 */
@Injectable()
export class PersistenceService {
  private readonly logger = new Logger(PersistenceService.name);
  private readonly locks = new KeyedMutex();
  private readonly dataDir: string;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.dataDir = config.dataDir;
  }

  pathOf<T>(store: StoreDefinition<T>): string {
    return path.join(this.dataDir, store.fileName);
  }

  /** Current document, or the store's empty value when the file does not exist yet */
  async load<T>(store: StoreDefinition<T>): Promise<T> {
    const file = this.pathOf(store);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return store.empty();
      }
      throw new PersistenceError(store.id, `cannot read ${file}: ${describeError(error)}`, { cause: error });
    }

    if (!raw.trim()) {
      return store.empty();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(store.id, `${file} is not valid JSON`, { cause: error });
    }

    const parsed = store.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PersistenceError(
        store.id,
        `${file} does not match the ${store.id} schema at ${issue?.path.join('.') || '<root>'}: ${issue?.message}`,
      );
    }
    return parsed.data;
  }

  /** Replaces the whole document */
  commit<T>(store: StoreDefinition<T>, value: T): Promise<void> {
    return this.locks.runExclusive(store.id, () => this.writeAtomic(store, value));
  }

  /**
   * Read-modify-write under the store lock. `mutate` may throw to abort;
   * nothing is written in that case.
   */
  update<T>(store: StoreDefinition<T>, mutate: (current: T) => T | Promise<T>): Promise<T> {
    return this.locks.runExclusive(store.id, async () => {
      const next = await mutate(await this.load(store));
      await this.writeAtomic(store, next);
      return next;
    });
  }

  private async writeAtomic<T>(store: StoreDefinition<T>, value: T): Promise<void> {
    const file = this.pathOf(store);
    const tmp = `${file}.${process.pid}.${uuidv4()}.tmp`;
    const content = JSON.stringify(value, null, 2) + '\n';

    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      const handle = await fs.open(tmp, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, file);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      this.logger.error(`commit of ${store.id} failed: ${describeError(error)}`);
      throw new PersistenceError(store.id, `cannot write ${file}: ${describeError(error)}`, { cause: error });
    }

    this.logger.debug(`committed ${store.id} (${content.length} bytes)`);
  }
}
