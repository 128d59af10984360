import 'dotenv/config';
import { PgStore } from './pgStore.js';

const store = new PgStore();
try {
  const res = await store.migrate();
  console.log(`[migrate] applied=${res.applied.length} skipped=${res.skipped.length}`);
  if (res.applied.length) console.log(res.applied.join('\n'));
} catch (err) {
  console.error('[migrate] failed', err);
  process.exitCode = 1;
} finally {
  await store.close();
}
