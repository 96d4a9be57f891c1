import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SequelizeModuleOptions } from '@nestjs/sequelize';

const logger = new Logger('Sequelize');

/**
 * Sequelize connection options from environment variables.
 * DB_DIALECT selects postgres (default) or sqlite.
 */
export function buildSequelizeOptions(
  config: ConfigService,
): SequelizeModuleOptions {
  const dialect = config.get<string>('DB_DIALECT', 'postgres');
  const logging =
    config.get<string>('DB_LOGGING') === 'true'
      ? (sql: string) => logger.debug(sql)
      : false;
  const synchronize = config.get<string>('DB_SYNC', 'false') === 'true';

  if (dialect === 'sqlite') {
    return {
      dialect: 'sqlite',
      storage: config.get<string>('DB_STORAGE', ':memory:'),
      autoLoadModels: true,
      synchronize,
      logging,
    };
  }

  if (dialect !== 'postgres') {
    throw new Error(
      `Unsupported DB_DIALECT "${dialect}"; expected postgres or sqlite`,
    );
  }

  const ssl = config.get<string>('DB_SSL') === 'true';
  return {
    dialect: 'postgres',
    host: config.get<string>('DB_HOST', 'localhost'),
    port: parseInt(config.get<string>('DB_PORT', '5432'), 10),
    database: config.get<string>('DB_NAME', 'leave_db'),
    username: config.get<string>('DB_USER', 'postgres'),
    password: config.get<string>('DB_PASS', 'postgres'),
    autoLoadModels: true,
    synchronize,
    logging,
    dialectOptions: ssl ? { ssl: { require: true, rejectUnauthorized: false } } : {},
  };
}
