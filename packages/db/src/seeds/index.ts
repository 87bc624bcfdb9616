import { createPool, close } from '../connection';
import { seedDevItems } from './dev-items';

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    console.error('DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const pool = createPool(connectionString, { max: 1 });

  try {
    const created = await seedDevItems(pool);
    console.warn(`Seeded ${created} items`);
  } catch (error) {
    console.error('Error seeding data:', error);
    process.exitCode = 1;
  } finally {
    await close(pool);
  }
}

void main();
