import { Entity, PrimaryGeneratedColumn, Column, OneToMany, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { User } from '../../user/entities/user.entity';

@Entity('schools')
export class School {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: 20, unique: true })
  abbreviation!: string; // initials of the name, e.g. "GHS"

  // Active join code; regenerating overwrites these three columns in place.
  @Column({ type: 'varchar', length: 5, unique: true, nullable: true })
  joinCode!: string | null;

  @Column({ type: 'timestamp', nullable: true })
  joinCodeIssuedAt!: Date | null;

  @Column({ type: 'timestamp', nullable: true })
  joinCodeExpiresAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @OneToMany(() => User, (user: User) => user.school)
  users!: User[];
}
