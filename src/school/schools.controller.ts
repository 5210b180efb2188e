import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SchoolsService } from './schools.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { Roles } from '../user/decorators/roles.decorator';
import { Role } from '../user/enums/role.enum';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Public } from '../auth/auth.guard';
import { AuthUser, CurrentUser } from '../common/decorators/current-user.decorator';
import { RegisterSchoolDto } from './dto/register-school.dto';

@ApiTags('Schools')
@Controller('schools')
@UseGuards(JwtAuthGuard, RolesGuard, TenantGuard)
export class SchoolsController {
  constructor(private readonly schoolsService: SchoolsService) {}

  @Public()
  @Post('register')
  @ApiOperation({ summary: 'Register a school with its first admin and join code' })
  @ApiResponse({ status: 201, description: 'School registered' })
  register(@Body() body: RegisterSchoolDto) {
    return this.schoolsService.register(body);
  }

  @Get(':id/join-code')
  @ApiBearerAuth()
  @Roles(Role.ADMIN)
  @ApiOperation({ summary: "Show the school's active join code" })
  getJoinCode(@Param('id', ParseUUIDPipe) id: string, @CurrentUser() user: AuthUser) {
    return this.schoolsService.getJoinCode(id, user);
  }

  @Post(':id/join-code/regenerate')
  @ApiBearerAuth()
  @Roles(Role.ADMIN)
  @ApiOperation({ summary: 'Replace the join code; the previous one stops working at once' })
  regenerateJoinCode(@Param('id', ParseUUIDPipe) id: string, @CurrentUser() user: AuthUser) {
    return this.schoolsService.regenerateJoinCode(id, user);
  }
}
