async function main() {
  process.env.DATABASE_URL =
    process.env.DATABASE_URL ?? 'postgresql://localhost:5432/officehours';
  process.env.PERSISTENCE_DRIVER = 'postgres';
  process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

  const { closeDb, logger, runMigrations } = await import('@officehours/shared');

  logger.info('Starting migrations');
  const applied = await runMigrations();
  await closeDb();
  logger.info({ applied }, 'Migrations finished');
}

main().catch(async (error) => {
  const { logger } = await import('@officehours/shared');
  logger.error({ err: error }, 'Migration runner failed');
  process.exit(1);
});
