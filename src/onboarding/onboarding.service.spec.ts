import { OnboardingService } from './onboarding.service';
import {
  AlreadyResolvedException,
  CrossSchoolAccessException,
  EmailTakenException,
  JoinCodeInvalidException,
  PendingUserNotFoundException,
} from './exceptions/onboarding.exceptions';
import { Role } from '../user/enums/role.enum';
import { UserStatus } from '../user/enums/user-status.enum';
import { AuthUser } from '../common/decorators/current-user.decorator';

const createdAt = new Date('2026-03-02T09:00:00.000Z');

const pendingUser = {
  id: 'u1',
  fullName: 'Amina Banda',
  email: 'amina@example.test',
  password: 'hashed',
  role: Role.STAFF,
  status: UserStatus.PENDING,
  schoolId: 's1',
  createdAt,
};

const admin: AuthUser = { id: 'a1', email: 'admin@example.test', role: Role.ADMIN, schoolId: 's1' };

describe('OnboardingService', () => {
  let service: OnboardingService;
  const manager = { tag: 'tx' };
  const dataSource: any = {
    transaction: jest.fn().mockImplementation(async (work: (m: unknown) => Promise<unknown>) => work(manager)),
  };
  const joinCodeIssuer: any = { validate: jest.fn() };
  const usersService: any = {
    createPendingStaff: jest.fn(),
    findPendingBySchool: jest.fn(),
    findById: jest.fn(),
    updateStatus: jest.fn(),
  };
  const systemLoggingService: any = {
    logStaffJoinRequested: jest.fn(),
    logStaffResolved: jest.fn(),
  };

  beforeEach(() => {
    jest.clearAllMocks();
    service = new OnboardingService(dataSource, joinCodeIssuer, usersService, systemLoggingService);
  });

  describe('submitJoinRequest', () => {
    it('validates the code and creates the pending user in the same transaction', async () => {
      joinCodeIssuer.validate.mockResolvedValue('s1');
      usersService.createPendingStaff.mockResolvedValue({ ...pendingUser });

      const result = await service.submitJoinRequest('72391', 'Amina Banda', 'amina@example.test', 'test-password');

      expect(joinCodeIssuer.validate).toHaveBeenCalledWith('72391', manager);
      expect(usersService.createPendingStaff).toHaveBeenCalledWith(
        { fullName: 'Amina Banda', email: 'amina@example.test', password: 'test-password', schoolId: 's1' },
        manager,
      );
      expect(result).toEqual({
        id: 'u1',
        fullName: 'Amina Banda',
        email: 'amina@example.test',
        role: Role.STAFF,
        status: UserStatus.PENDING,
        schoolId: 's1',
        createdAt,
      });
      expect(systemLoggingService.logStaffJoinRequested).toHaveBeenCalledWith('u1', 'amina@example.test', 's1');
    });

    it('does not create a user for an invalid code', async () => {
      joinCodeIssuer.validate.mockRejectedValue(new JoinCodeInvalidException());

      await expect(
        service.submitJoinRequest('00000', 'Amina Banda', 'amina@example.test', 'test-password'),
      ).rejects.toBeInstanceOf(JoinCodeInvalidException);
      expect(usersService.createPendingStaff).not.toHaveBeenCalled();
      expect(systemLoggingService.logStaffJoinRequested).not.toHaveBeenCalled();
    });

    it('propagates a taken email', async () => {
      joinCodeIssuer.validate.mockResolvedValue('s1');
      usersService.createPendingStaff.mockRejectedValue(new EmailTakenException());

      await expect(
        service.submitJoinRequest('72391', 'Amina Banda', 'amina@example.test', 'test-password'),
      ).rejects.toThrow('Email already registered');
    });
  });

  describe('listPending', () => {
    it("returns the admin's own school's pending users", async () => {
      usersService.findPendingBySchool.mockResolvedValue([{ ...pendingUser }]);

      const result = await service.listPending('s1', admin);

      expect(usersService.findPendingBySchool).toHaveBeenCalledWith('s1');
      expect(result.map((u) => u.id)).toEqual(['u1']);
      expect(result[0]).not.toHaveProperty('password');
    });

    it('refuses another school', async () => {
      await expect(service.listPending('s2', admin)).rejects.toBeInstanceOf(CrossSchoolAccessException);
      expect(usersService.findPendingBySchool).not.toHaveBeenCalled();
    });
  });

  describe('resolve', () => {
    it('approves a pending user', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser });
      usersService.updateStatus.mockResolvedValue(true);

      const result = await service.resolve('u1', admin, 'approve');

      expect(usersService.updateStatus).toHaveBeenCalledWith('u1', UserStatus.PENDING, UserStatus.ACTIVE);
      expect(result.status).toBe(UserStatus.ACTIVE);
      expect(systemLoggingService.logStaffResolved).toHaveBeenCalledWith('u1', UserStatus.PENDING, UserStatus.ACTIVE, admin);
    });

    it('rejects a pending user', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser });
      usersService.updateStatus.mockResolvedValue(true);

      const result = await service.resolve('u1', admin, 'reject');

      expect(usersService.updateStatus).toHaveBeenCalledWith('u1', UserStatus.PENDING, UserStatus.REJECTED);
      expect(result.status).toBe(UserStatus.REJECTED);
    });

    it('reports an unknown user as not found', async () => {
      usersService.findById.mockResolvedValue(null);

      await expect(service.resolve('missing', admin, 'approve')).rejects.toBeInstanceOf(PendingUserNotFoundException);
    });

    it('reports an admin of the same school as not found', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser, id: 'a1', role: Role.ADMIN, status: UserStatus.ACTIVE });

      await expect(service.resolve('a1', admin, 'reject')).rejects.toThrow('User a1 not found');
      expect(usersService.updateStatus).not.toHaveBeenCalled();
    });

    it('refuses users of another school', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser, schoolId: 's2' });

      await expect(service.resolve('u1', admin, 'approve')).rejects.toBeInstanceOf(CrossSchoolAccessException);
      expect(usersService.updateStatus).not.toHaveBeenCalled();
    });

    it('refuses an admin without a school', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser, schoolId: null });

      await expect(
        service.resolve('u1', { ...admin, schoolId: null }, 'approve'),
      ).rejects.toBeInstanceOf(CrossSchoolAccessException);
    });

    it('refuses a user that is no longer pending', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser, status: UserStatus.ACTIVE });

      await expect(service.resolve('u1', admin, 'reject')).rejects.toBeInstanceOf(AlreadyResolvedException);
      expect(usersService.updateStatus).not.toHaveBeenCalled();
    });

    it('reports a lost race as already resolved', async () => {
      usersService.findById.mockResolvedValue({ ...pendingUser });
      usersService.updateStatus.mockResolvedValue(false);

      await expect(service.resolve('u1', admin, 'approve')).rejects.toThrow(
        'User u1 has already been approved or rejected',
      );
      expect(systemLoggingService.logStaffResolved).not.toHaveBeenCalled();
    });
  });
});
