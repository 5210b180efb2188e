import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { User } from '../user/entities/user.entity';
import { UsersService } from '../user/user.service';
import { UserStatus } from '../user/enums/user-status.enum';
import { Role } from '../user/enums/role.enum';

export type SafeUser = Omit<User, 'password'>;

export interface JwtPayload {
  sub: string;
  email: string;
  role: Role;
  schoolId: string | null;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private usersService: UsersService,
    private jwtService: JwtService,
  ) {}

  async validateUser(email: string, password: string): Promise<SafeUser | null> {
    const trimmed = (email || '').trim();
    if (!trimmed) {
      return null;
    }

    const user = await this.usersService.findByEmail(trimmed);
    if (!user) {
      this.logger.debug('Login attempt for unknown email');
      return null; // Passport expects null for failure
    }

    const isPasswordValid = await bcrypt.compare(password, user.password);
    if (!isPasswordValid) {
      this.logger.debug(`Invalid password for ${user.id}`);
      return null;
    }

    // pending and rejected staff cannot sign in until an admin approves them
    if (user.status !== UserStatus.ACTIVE) {
      this.logger.debug(`Login refused for ${user.id}: status ${user.status}`);
      return null;
    }

    const { password: _pw, ...result } = user;
    return result;
  }

  async login(user: SafeUser) {
    await this.usersService.updateLoginActivity(user.id, new Date());

    const payload: JwtPayload = {
      sub: user.id,
      email: user.email,
      role: user.role,
      schoolId: user.schoolId,
    };
    return {
      access_token: this.jwtService.sign(payload),
      user: {
        id: user.id,
        fullName: user.fullName,
        email: user.email,
        role: user.role,
        status: user.status,
        schoolId: user.schoolId,
      },
    };
  }

  async validateToken(userId: string): Promise<User> {
    const user = await this.usersService.findById(userId);
    if (!user || user.status !== UserStatus.ACTIVE) {
      throw new UnauthorizedException('User not found or inactive');
    }
    return user;
  }
}
