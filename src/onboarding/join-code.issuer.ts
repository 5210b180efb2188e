import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOneOptions, Repository } from 'typeorm';
import { School } from '../school/entities/school.entity';
import { CLOCK, Clock } from '../common/time/clock';
import { CODE_GENERATOR, CodeGenerator } from '../common/random/code-generator';
import { isUniqueViolation } from '../database/query-errors';
import { JoinCodeInvalidException } from './exceptions/onboarding.exceptions';
import { JOIN_CODE_LENGTH, JOIN_CODE_MAX_ATTEMPTS, JOIN_CODE_TTL_MS } from './onboarding.constants';

export interface JoinCode {
  schoolId: string;
  code: string;
  issuedAt: Date;
  expiresAt: Date;
}

const JOIN_CODE_PATTERN = new RegExp(`^\\d{${JOIN_CODE_LENGTH}}$`);

/**
 * Owns the single active join code of every school.
 *
 * The code lives on the school row, so replacing it is one UPDATE. Pass the
 * EntityManager of an open transaction to take part in it: `validate` then
 * reads the row FOR SHARE, which makes a concurrent regenerate wait until
 * the join that validated the old code has committed.
 */
@Injectable()
export class JoinCodeIssuer {
  private readonly logger = new Logger(JoinCodeIssuer.name);

  constructor(
    @InjectRepository(School)
    private readonly schoolRepository: Repository<School>,
    @Inject(CLOCK)
    private readonly clock: Clock,
    @Inject(CODE_GENERATOR)
    private readonly codeGenerator: CodeGenerator,
  ) {}

  async issue(schoolId: string, manager?: EntityManager): Promise<JoinCode> {
    const repo = this.repository(manager);
    const school = await repo.findOne({ where: { id: schoolId } });
    if (!school) throw new NotFoundException('School not found');

    for (let attempt = 1; attempt <= JOIN_CODE_MAX_ATTEMPTS; attempt++) {
      const code = this.codeGenerator.randomDigits(JOIN_CODE_LENGTH);

      // The school's own current code counts as taken, otherwise a regenerate could hand it back.
      const holder = await repo.findOne({ where: { joinCode: code } });
      if (holder) {
        this.logger.debug(`Join code collision on attempt ${attempt} for school ${schoolId}`);
        continue;
      }

      const issuedAt = this.clock.now();
      const expiresAt = new Date(issuedAt.getTime() + JOIN_CODE_TTL_MS);
      try {
        await repo.update(
          { id: schoolId },
          { joinCode: code, joinCodeIssuedAt: issuedAt, joinCodeExpiresAt: expiresAt },
        );
      } catch (error) {
        // A failed statement aborts an enclosing transaction, so only standalone writes retry.
        if (!manager && isUniqueViolation(error)) {
          this.logger.debug(`Join code attempt ${attempt} lost a race for school ${schoolId}, retrying`);
          continue;
        }
        throw error;
      }

      this.logger.log(`Issued join code for school ${schoolId}, expires ${expiresAt.toISOString()}`);
      return { schoolId, code, issuedAt, expiresAt };
    }

    this.logger.error(`Gave up allocating a join code for school ${schoolId} after ${JOIN_CODE_MAX_ATTEMPTS} attempts`);
    throw new InternalServerErrorException('Could not allocate a unique join code');
  }

  regenerate(schoolId: string, manager?: EntityManager): Promise<JoinCode> {
    return this.issue(schoolId, manager);
  }

  /** Resolves `code` to the id of the school whose unexpired active code it is. */
  async validate(code: string, manager?: EntityManager): Promise<string> {
    if (!JOIN_CODE_PATTERN.test(code)) {
      throw new JoinCodeInvalidException();
    }

    const options: FindOneOptions<School> = { where: { joinCode: code } };
    if (manager) {
      options.lock = { mode: 'pessimistic_read' };
    }
    const school = await this.repository(manager).findOne(options);

    const expiresAt = school?.joinCodeExpiresAt;
    if (!school || !expiresAt || expiresAt.getTime() <= this.clock.now().getTime()) {
      throw new JoinCodeInvalidException();
    }
    return school.id;
  }

  async current(schoolId: string): Promise<JoinCode | null> {
    const school = await this.schoolRepository.findOne({ where: { id: schoolId } });
    if (!school) throw new NotFoundException('School not found');
    if (!school.joinCode || !school.joinCodeIssuedAt || !school.joinCodeExpiresAt) {
      return null;
    }
    return {
      schoolId: school.id,
      code: school.joinCode,
      issuedAt: school.joinCodeIssuedAt,
      expiresAt: school.joinCodeExpiresAt,
    };
  }

  private repository(manager?: EntityManager): Repository<School> {
    return manager ? manager.getRepository(School) : this.schoolRepository;
  }
}
