import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Log, LogLevel } from './logs.entity';
import { AuthUser } from '../common/decorators/current-user.decorator';

// onboarding audit entries are informational or warnings
type AuditLevel = Extract<LogLevel, 'info' | 'warn'>;

export interface LogEntry {
  action: string;
  module: string;
  level: AuditLevel;
  schoolId?: string | null; // tenant scope
  performedBy?: AuthUser | null;
  entityId?: string;
  entityType?: string;
  oldValues?: Record<string, unknown>;
  newValues?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

@Injectable()
export class SystemLoggingService {
  private readonly logger = new Logger(SystemLoggingService.name);

  constructor(
    @InjectRepository(Log)
    private readonly logRepository: Repository<Log>,
  ) {}

  async logAction(logEntry: LogEntry): Promise<void> {
    try {
      const log = this.logRepository.create({
        action: logEntry.action,
        module: logEntry.module,
        level: logEntry.level,
        performedBy: logEntry.performedBy ? { ...logEntry.performedBy } : null,
        schoolId: logEntry.schoolId ?? logEntry.performedBy?.schoolId ?? null,
        entityId: logEntry.entityId ?? null,
        entityType: logEntry.entityType ?? null,
        oldValues: logEntry.oldValues ?? null,
        newValues: logEntry.newValues ?? null,
        metadata: {
          ...logEntry.metadata,
          timestamp: new Date().toISOString(),
        },
      });

      await this.logRepository.save(log);

      // Also log to console based on level
      const message = `[${logEntry.module}] ${logEntry.action}`;
      const context = JSON.stringify({
        entityId: logEntry.entityId,
        entityType: logEntry.entityType,
        performedBy: logEntry.performedBy?.email,
      });

      if (logEntry.level === 'warn') {
        this.logger.warn(`${message} ${context}`);
      } else {
        this.logger.log(`${message} ${context}`);
      }
    } catch (error) {
      // Audit failures must not fail the request that triggered them
      this.logger.error('Failed to save log entry', error instanceof Error ? error.stack : String(error));
    }
  }

  // Onboarding Module Specific Logging
  async logJoinCodeIssued(schoolId: string, expiresAt: Date, performedBy?: AuthUser | null) {
    await this.logAction({
      action: performedBy ? 'JOIN_CODE_REGENERATED' : 'JOIN_CODE_ISSUED',
      module: 'ONBOARDING',
      level: 'info',
      schoolId,
      performedBy,
      entityId: schoolId,
      entityType: 'School',
      // the code itself is a credential and stays out of the audit trail
      newValues: { joinCodeExpiresAt: expiresAt.toISOString() },
      metadata: {
        description: performedBy
          ? `Join code regenerated by ${performedBy.email}`
          : 'Initial join code issued at school registration',
      },
    });
  }

  async logStaffJoinRequested(userId: string, email: string, schoolId: string) {
    await this.logAction({
      action: 'STAFF_JOIN_REQUESTED',
      module: 'ONBOARDING',
      level: 'info',
      schoolId,
      entityId: userId,
      entityType: 'User',
      newValues: { email, status: 'pending' },
      metadata: {
        description: `Staff member ${email} requested to join with a join code`,
      },
    });
  }

  async logStaffResolved(userId: string, oldStatus: string, newStatus: string, performedBy: AuthUser) {
    await this.logAction({
      action: newStatus === 'active' ? 'STAFF_APPROVED' : 'STAFF_REJECTED',
      module: 'ONBOARDING',
      level: newStatus === 'active' ? 'info' : 'warn',
      schoolId: performedBy.schoolId,
      performedBy,
      entityId: userId,
      entityType: 'User',
      oldValues: { status: oldStatus },
      newValues: { status: newStatus },
    });
  }
}
