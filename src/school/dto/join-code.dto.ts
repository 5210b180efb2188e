export class JoinCodeDto {
  schoolId!: string;
  joinCode!: string;
  issuedAt!: Date;
  expiresAt!: Date;
}

export class SchoolRegistrationResponseDto {
  id!: string;
  name!: string;
  abbreviation!: string;
  joinCode!: string;
  joinCodeExpiresAt!: Date;
}
