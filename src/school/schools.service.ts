import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { School } from './entities/school.entity';
import { UsersService } from '../user/user.service';
import { JoinCode, JoinCodeIssuer } from '../onboarding/join-code.issuer';
import { SystemLoggingService } from '../logs/system-logging.service';
import { AuthUser } from '../common/decorators/current-user.decorator';
import { RegisterSchoolDto } from './dto/register-school.dto';
import { JoinCodeDto, SchoolRegistrationResponseDto } from './dto/join-code.dto';
import {
  CrossSchoolAccessException,
  EmailTakenException,
  SchoolNameTakenException,
} from '../onboarding/exceptions/onboarding.exceptions';

const ABBREVIATION_MAX_SUFFIX = 999;

export function abbreviate(name: string): string {
  const initials = name
    .trim()
    .split(/\s+/)
    .map((word) => word.replace(/[^a-zA-Z0-9]/g, '').charAt(0).toUpperCase())
    .join('');
  return (initials || 'SCH').slice(0, 16);
}

const toJoinCodeDto = (joinCode: JoinCode): JoinCodeDto => ({
  schoolId: joinCode.schoolId,
  joinCode: joinCode.code,
  issuedAt: joinCode.issuedAt,
  expiresAt: joinCode.expiresAt,
});

@Injectable()
export class SchoolsService {
  private readonly logger = new Logger(SchoolsService.name);

  constructor(
    @InjectRepository(School) private repo: Repository<School>,
    private readonly usersService: UsersService,
    private readonly joinCodeIssuer: JoinCodeIssuer,
    private readonly systemLoggingService: SystemLoggingService,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Creates the school, its first admin and its first join code in one
   * transaction; a failure in any step leaves nothing behind.
   */
  async register(dto: RegisterSchoolDto): Promise<SchoolRegistrationResponseDto> {
    const name = dto.schoolName.trim();

    // Enforce uniqueness of name & admin email early
    if (await this.repo.findOne({ where: { name } })) {
      throw new SchoolNameTakenException();
    }
    if (await this.usersService.findByEmail(dto.admin.email)) {
      throw new EmailTakenException();
    }

    const { school, joinCode } = await this.dataSource.transaction(async (manager) => {
      const abbreviation = await this.uniqueAbbreviation(name, manager);
      const school = await manager.save(manager.create(School, { name, abbreviation }));

      await this.usersService.createAdmin(
        {
          fullName: dto.admin.name,
          email: dto.admin.email,
          password: dto.admin.password,
          schoolId: school.id,
        },
        manager,
      );

      const joinCode = await this.joinCodeIssuer.issue(school.id, manager);
      return { school, joinCode };
    });

    this.logger.log(`Registered school ${school.id} (${school.abbreviation})`);
    await this.systemLoggingService.logJoinCodeIssued(school.id, joinCode.expiresAt);

    return {
      id: school.id,
      name: school.name,
      abbreviation: school.abbreviation,
      joinCode: joinCode.code,
      joinCodeExpiresAt: joinCode.expiresAt,
    };
  }

  async findOne(id: string): Promise<School> {
    const school = await this.repo.findOne({ where: { id } });
    if (!school) throw new NotFoundException('School not found');
    return school;
  }

  async getJoinCode(schoolId: string, actor: AuthUser): Promise<JoinCodeDto> {
    await this.ensureAdminOf(schoolId, actor);
    const joinCode = await this.joinCodeIssuer.current(schoolId);
    if (!joinCode) throw new NotFoundException('No join code has been issued for this school');
    return toJoinCodeDto(joinCode);
  }

  async regenerateJoinCode(schoolId: string, actor: AuthUser): Promise<JoinCodeDto> {
    await this.ensureAdminOf(schoolId, actor);
    const joinCode = await this.joinCodeIssuer.regenerate(schoolId);
    await this.systemLoggingService.logJoinCodeIssued(schoolId, joinCode.expiresAt, actor);
    return toJoinCodeDto(joinCode);
  }

  private async ensureAdminOf(schoolId: string, actor: AuthUser): Promise<void> {
    await this.findOne(schoolId);
    if (actor.schoolId !== schoolId) {
      throw new CrossSchoolAccessException('You can only manage join codes for your school');
    }
  }

  private async uniqueAbbreviation(name: string, manager: EntityManager): Promise<string> {
    const base = abbreviate(name);
    const schools = manager.getRepository(School);

    let candidate = base;
    let counter = 1;
    while (await schools.findOne({ where: { abbreviation: candidate } })) {
      if (counter > ABBREVIATION_MAX_SUFFIX) {
        throw new ConflictException(`No free abbreviation left for ${base}`);
      }
      candidate = `${base}${counter}`;
      counter++;
    }
    return candidate;
  }
}
