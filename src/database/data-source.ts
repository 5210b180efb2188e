// Entry point for the TypeORM CLI (migration:run / migration:revert)
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './ormconfig';

export default new DataSource(buildDataSourceOptions(new ConfigService()));
