import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { ConfigService } from '@nestjs/config';

const DEFAULT_DATABASE_URL = 'sqlite:///data.db';

/**
 * Resolves the TypeORM connection from configuration.
 *
 * `DATABASE_URL` wins when present (`postgres://...`, `sqlite:///file.db`,
 * `sqlite::memory:`). Without it, discrete `POSTGRES_*` settings select
 * Postgres; otherwise a local SQLite file is used.
 */
export function buildTypeOrmOptions(config: ConfigService): TypeOrmModuleOptions {
  const production = config.get<string>('NODE_ENV') === 'production';
  const common = {
    autoLoadEntities: true,
    synchronize: !production,
  };

  const postgresHost = config.get<string>('POSTGRES_HOST');
  const url = config.get<string>('DATABASE_URL') ?? (postgresHost ? undefined : DEFAULT_DATABASE_URL);

  if (url === undefined) {
    return {
      ...common,
      type: 'postgres',
      host: postgresHost,
      port: Number(config.get<string>('POSTGRES_PORT') ?? 5432),
      database: config.get<string>('POSTGRES_DB'),
      username: config.get<string>('POSTGRES_USER'),
      password: config.get<string>('POSTGRES_PASSWORD'),
      maxQueryExecutionTime: 500,
    };
  }

  if (url.startsWith('postgres')) {
    return { ...common, type: 'postgres', url, maxQueryExecutionTime: 500 };
  }

  // sql.js keeps the database in memory; a file location is loaded at startup and saved after each write
  const location = sqlitePath(url);
  if (location === ':memory:') {
    return { ...common, type: 'sqljs' };
  }
  return { ...common, type: 'sqljs', location, autoSave: true };
}

export function sqlitePath(url: string): string {
  const rest = url.replace(/^sqlite:/, '');
  if (rest === ':memory:' || rest === '///:memory:') return ':memory:';
  // sqlite:///relative.db and sqlite:////absolute/path.db
  return rest.startsWith('///') ? rest.slice(3) : rest.replace(/^\/\//, '');
}
