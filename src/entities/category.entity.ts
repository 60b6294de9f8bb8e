import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  OneToMany,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Title } from './title.entity';

@Entity()
export class Category {
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ description: 'Category name' })
  @Column({ type: 'varchar', length: 256, unique: true })
  name!: string;

  @ApiProperty({ description: 'URL-safe identifier' })
  @Column({ type: 'varchar', length: 50, unique: true })
  slug!: string;

  @OneToMany(() => Title, (title) => title.category)
  titles!: Title[];
}
