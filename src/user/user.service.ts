import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from './entities/user.entity';
import { Role } from './enums/role.enum';
import { UserStatus } from './enums/user-status.enum';
import { isUniqueViolation } from '../database/query-errors';
import { EmailTakenException } from '../onboarding/exceptions/onboarding.exceptions';

export interface NewUserInput {
  fullName: string;
  email: string;
  password: string;
  schoolId: string;
}

export const normalizeEmail = (email: string) => email.trim().toLowerCase();

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async findById(id: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async findByEmail(email: string, manager?: EntityManager): Promise<User | null> {
    if (!email) return null;
    return this.repository(manager).findOne({ where: { email: normalizeEmail(email) } });
  }

  /** Staff self-registration: the account waits in `pending` until an admin resolves it. */
  async createPendingStaff(input: NewUserInput, manager?: EntityManager): Promise<User> {
    return this.createUser(input, Role.STAFF, UserStatus.PENDING, manager);
  }

  async createAdmin(input: NewUserInput, manager?: EntityManager): Promise<User> {
    return this.createUser(input, Role.ADMIN, UserStatus.ACTIVE, manager);
  }

  // Insertion order, oldest first
  async findPendingBySchool(schoolId: string): Promise<User[]> {
    return this.userRepository.find({
      where: { schoolId, status: UserStatus.PENDING },
      order: { createdAt: 'ASC' },
    });
  }

  /**
   * Compare-and-set on the status column. Returns false when the row was not
   * in `expected` any more, i.e. another request resolved it first.
   */
  async updateStatus(id: string, expected: UserStatus, next: UserStatus): Promise<boolean> {
    const result = await this.userRepository.update({ id, status: expected }, { status: next });
    return (result.affected ?? 0) > 0;
  }

  async updateLoginActivity(userId: string, loginAt: Date): Promise<void> {
    try {
      await this.userRepository.update(userId, { lastLoginAt: loginAt });
    } catch (error) {
      // Login must still succeed when the activity stamp cannot be written
      this.logger.warn(`Failed to update login activity for ${userId}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async createUser(
    input: NewUserInput,
    role: Role,
    status: UserStatus,
    manager?: EntityManager,
  ): Promise<User> {
    const repo = this.repository(manager);
    const email = normalizeEmail(input.email);

    if (await repo.findOne({ where: { email } })) {
      throw new EmailTakenException();
    }

    const hashedPassword = await bcrypt.hash(input.password, 10);
    const user = repo.create({
      fullName: input.fullName.trim(),
      email,
      password: hashedPassword,
      role,
      status,
      schoolId: input.schoolId,
    });

    try {
      return await repo.save(user);
    } catch (error) {
      if (isUniqueViolation(error)) throw new EmailTakenException();
      throw error;
    }
  }

  private repository(manager?: EntityManager): Repository<User> {
    return manager ? manager.getRepository(User) : this.userRepository;
  }
}
