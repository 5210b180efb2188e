import { MigrationInterface, QueryRunner, Table, TableIndex } from "typeorm";

export class CreateOnboardingSchema1760860800000 implements MigrationInterface {
    name = 'CreateOnboardingSchema1760860800000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

        await queryRunner.createTable(new Table({
            name: "schools",
            columns: [
                { name: "id", type: "uuid", isPrimary: true, generationStrategy: "uuid", default: "uuid_generate_v4()" },
                { name: "name", type: "varchar", length: "255", isUnique: true },
                { name: "abbreviation", type: "varchar", length: "20", isUnique: true },
                // one active join code per school, replaced in place
                { name: "joinCode", type: "varchar", length: "5", isNullable: true, isUnique: true },
                { name: "joinCodeIssuedAt", type: "timestamp", isNullable: true },
                { name: "joinCodeExpiresAt", type: "timestamp", isNullable: true },
                { name: "createdAt", type: "timestamp", default: "now()" },
                { name: "updatedAt", type: "timestamp", default: "now()" },
            ],
        }), true);

        await queryRunner.createTable(new Table({
            name: "users",
            columns: [
                { name: "id", type: "uuid", isPrimary: true, generationStrategy: "uuid", default: "uuid_generate_v4()" },
                { name: "fullName", type: "varchar", length: "255" },
                { name: "email", type: "varchar", length: "255", isUnique: true },
                { name: "password", type: "varchar" },
                { name: "role", type: "enum", enum: ["SUPER_ADMIN", "ADMIN", "STAFF"], default: "'STAFF'" },
                { name: "status", type: "enum", enum: ["pending", "active", "rejected"], default: "'pending'" },
                { name: "schoolId", type: "uuid", isNullable: true },
                { name: "lastLoginAt", type: "timestamp", isNullable: true },
                { name: "createdAt", type: "timestamp", default: "now()" },
                { name: "updatedAt", type: "timestamp", default: "now()" },
            ],
            foreignKeys: [
                {
                    columnNames: ["schoolId"],
                    referencedTableName: "schools",
                    referencedColumnNames: ["id"],
                    onDelete: "CASCADE"
                }
            ],
        }), true);

        await queryRunner.createIndex("users", new TableIndex({ name: "IDX_USERS_SCHOOL", columnNames: ["schoolId"] }));
        await queryRunner.createIndex("users", new TableIndex({ name: "IDX_USERS_STATUS", columnNames: ["status"] }));

        await queryRunner.createTable(new Table({
            name: "logs",
            columns: [
                { name: "id", type: "uuid", isPrimary: true, generationStrategy: "uuid", default: "uuid_generate_v4()" },
                { name: "action", type: "varchar" },
                { name: "module", type: "varchar", length: "50" },
                { name: "level", type: "enum", enum: ["info", "warn", "error", "debug"], default: "'info'" },
                { name: "performedBy", type: "json", isNullable: true },
                { name: "entityId", type: "varchar", isNullable: true },
                { name: "entityType", type: "varchar", isNullable: true },
                { name: "oldValues", type: "json", isNullable: true },
                { name: "newValues", type: "json", isNullable: true },
                { name: "metadata", type: "json", isNullable: true },
                { name: "schoolId", type: "uuid", isNullable: true },
                { name: "timestamp", type: "timestamp", default: "now()" },
            ],
        }), true);

        await queryRunner.createIndex("logs", new TableIndex({ name: "IDX_LOGS_SCHOOL", columnNames: ["schoolId"] }));
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.dropTable("logs", true);
        await queryRunner.dropTable("users", true);
        await queryRunner.dropTable("schools", true);
        await queryRunner.query(`DROP TYPE IF EXISTS "logs_level_enum"`);
        await queryRunner.query(`DROP TYPE IF EXISTS "users_status_enum"`);
        await queryRunner.query(`DROP TYPE IF EXISTS "users_role_enum"`);
    }
}
