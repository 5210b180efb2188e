import { Type } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, MinLength, ValidateNested } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class SchoolAdminDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty()
  @IsEmail()
  email!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8)
  password!: string;
}

export class RegisterSchoolDto {
  @ApiProperty({ example: 'Greenfield High School' })
  @IsString()
  @IsNotEmpty()
  schoolName!: string;

  @ApiProperty({ type: SchoolAdminDto })
  @ValidateNested()
  @Type(() => SchoolAdminDto)
  admin!: SchoolAdminDto;
}
