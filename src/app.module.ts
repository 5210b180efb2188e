import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './user/users.module';
import { LogsModule } from './logs/logs.module';
import { SchoolModule } from './school/school.module';
import { OnboardingModule } from './onboarding/onboarding.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    AuthModule,
    UsersModule,
    LogsModule,
    SchoolModule,
    OnboardingModule,
  ],
})
export class AppModule {}
