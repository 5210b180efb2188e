import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { School } from '../school/entities/school.entity';
import { User } from '../user/entities/user.entity';
import { Log } from '../logs/logs.entity';

export const ENTITIES = [School, User, Log];

export function buildDataSourceOptions(configService: ConfigService): DataSourceOptions {
  return {
    type: 'postgres',
    host: configService.getOrDefault('DB_HOST', 'localhost'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: ENTITIES,
    migrations: [__dirname + '/../migrations/*{.ts,.js}'],
    synchronize: false,
    logging: configService.getOrDefault('NODE_ENV', 'development') === 'development',
  };
}
