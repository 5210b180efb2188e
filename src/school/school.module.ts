import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { School } from './entities/school.entity';
import { SchoolsService } from './schools.service';
import { SchoolsController } from './schools.controller';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../user/users.module';
import { LogsModule } from '../logs/logs.module';
import { OnboardingModule } from '../onboarding/onboarding.module';

@Module({
  imports: [TypeOrmModule.forFeature([School]), AuthModule, UsersModule, LogsModule, OnboardingModule],
  controllers: [SchoolsController],
  providers: [SchoolsService],
  exports: [SchoolsService],
})
export class SchoolModule {}
