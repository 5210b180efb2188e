import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { JoinSchoolDto } from './join-school.dto';
import { ResolveUserDto } from './resolve-user.dto';

const failedProperties = async (dto: object) => (await validate(dto)).map((error) => error.property);

describe('onboarding DTOs', () => {
  const join = {
    joinCode: '04217',
    name: 'Amina Banda',
    email: 'amina@example.test',
    password: 'test-password',
  };

  it('accepts a well formed join request', async () => {
    await expect(failedProperties(plainToInstance(JoinSchoolDto, join))).resolves.toEqual([]);
  });

  it('requires exactly five digits', async () => {
    for (const joinCode of ['4217', '042170', '04a17']) {
      await expect(failedProperties(plainToInstance(JoinSchoolDto, { ...join, joinCode }))).resolves.toEqual([
        'joinCode',
      ]);
    }
  });

  it('checks email and password length', async () => {
    const dto = plainToInstance(JoinSchoolDto, { ...join, email: 'not-an-email', password: 'short' });
    await expect(failedProperties(dto)).resolves.toEqual(['email', 'password']);
  });

  it('only knows approve and reject', async () => {
    await expect(failedProperties(plainToInstance(ResolveUserDto, { action: 'approve' }))).resolves.toEqual([]);
    await expect(failedProperties(plainToInstance(ResolveUserDto, { action: 'ban' }))).resolves.toEqual(['action']);
  });
});
