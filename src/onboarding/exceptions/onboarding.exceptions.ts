import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';

// Unknown and expired codes share one error on purpose: callers only learn to ask for a new code.
export class JoinCodeInvalidException extends BadRequestException {
  constructor() {
    super('Invalid or expired join code');
  }
}

export class CrossSchoolAccessException extends ForbiddenException {
  constructor(message = 'You can only manage users from your school') {
    super(message);
  }
}

export class PendingUserNotFoundException extends NotFoundException {
  constructor(userId: string) {
    super(`User ${userId} not found`);
  }
}

export class AlreadyResolvedException extends ConflictException {
  constructor(userId: string) {
    super(`User ${userId} has already been approved or rejected`);
  }
}

export class EmailTakenException extends BadRequestException {
  constructor() {
    super('Email already registered');
  }
}

export class SchoolNameTakenException extends BadRequestException {
  constructor() {
    super('School name already exists');
  }
}
