import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { School } from '../school/entities/school.entity';
import { UsersModule } from '../user/users.module';
import { LogsModule } from '../logs/logs.module';
import { AuthModule } from '../auth/auth.module';
import { JoinCodeIssuer } from './join-code.issuer';
import { OnboardingService } from './onboarding.service';
import { OnboardingController } from './onboarding.controller';
import { CLOCK, SystemClock } from '../common/time/clock';
import { CODE_GENERATOR, CryptoCodeGenerator } from '../common/random/code-generator';

@Module({
  imports: [TypeOrmModule.forFeature([School]), UsersModule, LogsModule, AuthModule],
  controllers: [OnboardingController],
  providers: [
    JoinCodeIssuer,
    OnboardingService,
    { provide: CLOCK, useClass: SystemClock },
    { provide: CODE_GENERATOR, useClass: CryptoCodeGenerator },
  ],
  exports: [JoinCodeIssuer],
})
export class OnboardingModule {}
