import { CATALOG_DATABASE_DIR, CATALOG_SOURCES_DIR } from '../config/pipeline';

export interface CliOptions {
  sourcesDir: string;
  databaseDir: string;
  remoteSourcesUrl?: string;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { sourcesDir: CATALOG_SOURCES_DIR, databaseDir: CATALOG_DATABASE_DIR };
  for (let index = 0; index < argv.length; index += 1) {
    const flag = argv[index];
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    switch (flag) {
      case '--sources':
        options.sourcesDir = value;
        break;
      case '--database':
        options.databaseDir = value;
        break;
      case '--remote':
        options.remoteSourcesUrl = value;
        break;
      default:
        throw new Error(`Unknown option ${flag}`);
    }
    index += 1;
  }
  return options;
}
