import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '../config/config.module';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './ormconfig';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...buildDataSourceOptions(configService),
        migrationsRun: configService.getOrDefault('DB_MIGRATIONS_RUN', 'true') === 'true',
      }),
    }),
  ],
})
export class DatabaseModule {}
