import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError, silentLogger } from '@shelfdb/core';
import { openStore } from '@shelfdb/sqlite';
import { openAsyncStore } from '@shelfdb/async';

async function main() {
  const dir = mkdtempSync(join(tmpdir(), 'shelfdb-example-'));
  const path = join(dir, 'example.db');

  // Root store with a small LRU cache
  const store = openStore(path, {
    table: 'settings',
    cacheStrategy: 'lru',
    cacheCapacity: 100,
  });

  console.log('\n=== shelfdb Example ===\n');

  // Example 1: Map-style writes and reads
  console.log('1. Writing settings...');
  store.set('theme', 'dark');
  store.set('limits', { maxUploads: 10, tags: ['a', 'b'] });
  console.log('theme =', store.get('theme'));
  console.log('limits =', store.get('limits'), '\n');

  // Example 2: Derived table on the same connection
  console.log('2. Using a second table...');
  const accounts = store.table('accounts');
  accounts.update({ alice: 100, bob: 50 });
  console.log('accounts =', accounts.toObject(), '\n');

  // Example 3: Transaction that rolls back
  console.log('3. Transfer that fails halfway...');
  try {
    accounts.withTransaction((tx) => {
      tx.set('alice', 0);
      throw new Error('payment gateway unavailable');
    });
  } catch (error) {
    console.log('Rolled back:', error instanceof Error ? error.message : error);
  }
  console.log('alice =', accounts.get('alice'), '\n');

  // Example 4: Validated query
  console.log('4. Querying with a validated WHERE clause...');
  const rows = accounts.query({ columns: ['key'], where: 'key LIKE ?', parameters: ['a%'] });
  console.log('rows =', rows);
  try {
    accounts.query({ where: '1=1; DROP TABLE accounts' });
  } catch (error) {
    if (error instanceof ValidationError) {
      console.log('Rejected:', error.violations.join('; '), '\n');
    }
  }

  store.close();

  // Example 5: Async bridge with a read pool
  console.log('5. Async access...');
  const asyncStore = await openAsyncStore(path, {
    table: 'settings',
    workerCount: 4,
    readPoolSize: 2,
    logger: silentLogger,
  });
  await Promise.all([asyncStore.set('a', 1), asyncStore.set('b', 2), asyncStore.set('c', 3)]);
  console.log('count =', await asyncStore.count());
  console.log('rows =', await asyncStore.query({ columns: ['key'], orderBy: 'key ASC' }));
  await asyncStore.close();

  rmSync(dir, { recursive: true, force: true });
}

main()
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
