import type { Config } from 'drizzle-kit';
import * as dotenv from 'dotenv';

dotenv.config();

const getDatabaseUrl = () => {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is required for library-service migrations.');
  }
  return url;
};

export default {
  schema: [
    './src/infrastructure/database/schemas/catalog-schema.ts',
    './src/infrastructure/database/schemas/account-schema.ts',
    './src/infrastructure/database/schemas/social-schema.ts',
  ],
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  tablesFilter: ['cat_*', 'acc_*', 'soc_*'],
  verbose: true,
  strict: true,
} satisfies Config;
