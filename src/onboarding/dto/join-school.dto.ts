import { IsEmail, IsNotEmpty, IsString, Length, Matches, MinLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class JoinSchoolDto {
  @ApiProperty({ example: '04217', description: 'Five-digit join code shared by the school admin' })
  @IsString()
  @Length(5, 5)
  @Matches(/^\d{5}$/, { message: 'joinCode must be 5 digits' })
  joinCode!: string;

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
