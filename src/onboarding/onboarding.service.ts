import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { JoinCodeIssuer } from './join-code.issuer';
import { UsersService } from '../user/user.service';
import { Role } from '../user/enums/role.enum';
import { UserStatus } from '../user/enums/user-status.enum';
import { SystemLoggingService } from '../logs/system-logging.service';
import { AuthUser } from '../common/decorators/current-user.decorator';
import { PendingUserDto, toPendingUserDto } from './dto/pending-user.dto';
import { ResolveAction } from './dto/resolve-user.dto';
import {
  AlreadyResolvedException,
  CrossSchoolAccessException,
  PendingUserNotFoundException,
} from './exceptions/onboarding.exceptions';

const NEXT_STATUS: Record<ResolveAction, UserStatus> = {
  approve: UserStatus.ACTIVE,
  reject: UserStatus.REJECTED,
};

@Injectable()
export class OnboardingService {
  private readonly logger = new Logger(OnboardingService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly joinCodeIssuer: JoinCodeIssuer,
    private readonly usersService: UsersService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  /**
   * Validates the code and stores a pending staff account in the code's
   * school. Both steps share one transaction so a regenerate cannot slip
   * in between them.
   */
  async submitJoinRequest(
    joinCode: string,
    name: string,
    email: string,
    password: string,
  ): Promise<PendingUserDto> {
    const user = await this.dataSource.transaction(async (manager) => {
      const schoolId = await this.joinCodeIssuer.validate(joinCode, manager);
      return this.usersService.createPendingStaff(
        { fullName: name, email, password, schoolId },
        manager,
      );
    });

    this.logger.log(`Staff ${user.email} joined school ${user.schoolId}, awaiting approval`);
    if (user.schoolId) {
      await this.systemLoggingService.logStaffJoinRequested(user.id, user.email, user.schoolId);
    }
    return toPendingUserDto(user);
  }

  async listPending(schoolId: string, admin: AuthUser): Promise<PendingUserDto[]> {
    if (admin.schoolId !== schoolId) {
      throw new CrossSchoolAccessException('You can only view pending users of your school');
    }
    const users = await this.usersService.findPendingBySchool(schoolId);
    return users.map(toPendingUserDto);
  }

  async resolve(userId: string, admin: AuthUser, action: ResolveAction): Promise<PendingUserDto> {
    const user = await this.usersService.findById(userId);
    // only staff accounts go through approval; admins are never pending users
    if (!user || user.role !== Role.STAFF) {
      throw new PendingUserNotFoundException(userId);
    }
    if (!admin.schoolId || user.schoolId !== admin.schoolId) {
      throw new CrossSchoolAccessException();
    }
    if (user.status !== UserStatus.PENDING) {
      throw new AlreadyResolvedException(userId);
    }

    const next = NEXT_STATUS[action];
    const won = await this.usersService.updateStatus(userId, UserStatus.PENDING, next);
    if (!won) {
      // a concurrent resolve got there between our read and the update
      throw new AlreadyResolvedException(userId);
    }

    await this.systemLoggingService.logStaffResolved(userId, UserStatus.PENDING, next, admin);
    return toPendingUserDto({ ...user, status: next });
  }
}
