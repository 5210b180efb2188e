import { IsIn } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export const RESOLVE_ACTIONS = ['approve', 'reject'] as const;
export type ResolveAction = (typeof RESOLVE_ACTIONS)[number];

export class ResolveUserDto {
  @ApiProperty({ enum: RESOLVE_ACTIONS })
  @IsIn(RESOLVE_ACTIONS)
  action!: ResolveAction;
}
