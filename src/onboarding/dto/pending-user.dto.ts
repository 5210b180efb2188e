import { User } from '../../user/entities/user.entity';
import { Role } from '../../user/enums/role.enum';
import { UserStatus } from '../../user/enums/user-status.enum';

export class PendingUserDto {
  id!: string;
  fullName!: string;
  email!: string;
  role!: Role;
  status!: UserStatus;
  schoolId!: string | null;
  createdAt!: Date;
}

export class JoinSchoolResponseDto {
  message!: string;
  user!: PendingUserDto;
}

export function toPendingUserDto(user: User): PendingUserDto {
  return {
    id: user.id,
    fullName: user.fullName,
    email: user.email,
    role: user.role,
    status: user.status,
    schoolId: user.schoolId,
    createdAt: user.createdAt,
  };
}
