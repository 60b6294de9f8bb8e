import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Check,
  BeforeInsert,
  BeforeUpdate,
} from 'typeorm';
import { Exclude } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';

export const USER_ROLES = ['user', 'moderator', 'admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

/** Username that resolves to the caller's own profile and can never be registered. */
export const RESERVED_USERNAME = 'me';

@Entity()
@Check('CHK_user_username_not_me', `LOWER("username") <> '${RESERVED_USERNAME}'`)
export class User {
  @ApiProperty({ description: 'User ID' })
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ description: 'Username' })
  @Column({ type: 'varchar', length: 150, unique: true })
  username!: string;

  // lower-cased copy of username; its unique index makes names case-insensitive
  @Column({ type: 'varchar', length: 150, unique: true, nullable: true })
  @Exclude()
  username_key!: string | null;

  @ApiProperty({ description: 'Email address' })
  @Column({ type: 'varchar', length: 254, unique: true })
  email!: string;

  @ApiProperty({ description: 'First name' })
  @Column({ type: 'varchar', length: 150, default: '' })
  first_name!: string;

  @ApiProperty({ description: 'Last name' })
  @Column({ type: 'varchar', length: 150, default: '' })
  last_name!: string;

  @ApiProperty({ description: 'Biography', nullable: true })
  @Column({ type: 'text', nullable: true })
  bio!: string | null;

  @ApiProperty({ description: 'Role', enum: USER_ROLES, default: 'user' })
  @Column({ type: 'varchar', length: 16, default: 'user' })
  role!: UserRole;

  @Column({ type: 'boolean', default: false })
  is_superuser!: boolean;

  // nonce bound into the outstanding confirmation code; empty when none is pending
  @Column({ type: 'varchar', length: 80, default: '' })
  @Exclude()
  confirmation_code!: string;

  @ApiProperty({ description: 'Account creation date' })
  @CreateDateColumn()
  created_at!: Date;

  @ApiProperty({ description: 'Last update date' })
  @UpdateDateColumn()
  updated_at!: Date;

  @BeforeInsert()
  @BeforeUpdate()
  syncUsernameKey(): void {
    this.username_key = this.username.toLowerCase();
  }
}
