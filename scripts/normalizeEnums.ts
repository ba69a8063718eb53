import db from '../src/db/connection';
import { normalizeLegacyEnums } from '../src/db/maintenance/normalizeLegacyEnums';

async function main(): Promise<void> {
  try {
    const report = await normalizeLegacyEnums(db);
    console.log('[normalize-enums] done', report);
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  console.error('[normalize-enums] failed:', err);
  process.exitCode = 1;
});
