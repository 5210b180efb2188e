import { CanActivate, ExecutionContext, Injectable, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Role } from '../../user/enums/role.enum';
import { IS_PUBLIC_KEY } from '../../auth/auth.guard';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';

@Injectable()
export class TenantGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = req.user;
    if (!user) return false;

    // SUPER_ADMIN is not scoped to a tenant; school-level checks downstream still apply
    if (user.role === Role.SUPER_ADMIN) {
      return true;
    }

    if (!user.schoolId) {
      throw new ForbiddenException('User not assigned to a school');
    }
    return true;
  }
}
