import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { OnboardingService } from './onboarding.service';
import { JoinSchoolDto } from './dto/join-school.dto';
import { ResolveUserDto } from './dto/resolve-user.dto';
import { JoinSchoolResponseDto, PendingUserDto } from './dto/pending-user.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Public } from '../auth/auth.guard';
import { Roles } from '../user/decorators/roles.decorator';
import { Role } from '../user/enums/role.enum';
import { AuthUser, CurrentUser } from '../common/decorators/current-user.decorator';

@ApiTags('Onboarding')
@Controller('onboarding')
@UseGuards(JwtAuthGuard, RolesGuard, TenantGuard)
export class OnboardingController {
  constructor(private readonly onboardingService: OnboardingService) {}

  @Public()
  @Post('join')
  @ApiOperation({ summary: 'Join a school as staff using its join code' })
  @ApiResponse({ status: 201, description: 'Registration pending admin approval' })
  @ApiResponse({ status: 400, description: 'Invalid or expired join code' })
  async join(@Body() dto: JoinSchoolDto): Promise<JoinSchoolResponseDto> {
    const user = await this.onboardingService.submitJoinRequest(
      dto.joinCode,
      dto.name,
      dto.email,
      dto.password,
    );
    return { message: 'Registration successful, pending admin approval.', user };
  }

  @Get('schools/:schoolId/pending-users')
  @ApiBearerAuth()
  @Roles(Role.ADMIN)
  @ApiOperation({ summary: 'List staff waiting for approval' })
  listPending(
    @Param('schoolId', ParseUUIDPipe) schoolId: string,
    @CurrentUser() admin: AuthUser,
  ): Promise<PendingUserDto[]> {
    return this.onboardingService.listPending(schoolId, admin);
  }

  @Patch('users/:id/status')
  @ApiBearerAuth()
  @Roles(Role.ADMIN)
  @ApiOperation({ summary: 'Approve or reject a pending staff member' })
  @ApiResponse({ status: 409, description: 'User was already approved or rejected' })
  resolve(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ResolveUserDto,
    @CurrentUser() admin: AuthUser,
  ): Promise<PendingUserDto> {
    return this.onboardingService.resolve(id, admin, dto.action);
  }
}
