import { Entity, Column, PrimaryGeneratedColumn, ManyToMany } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Title } from './title.entity';

@Entity()
export class Genre {
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ description: 'Genre name' })
  @Column({ type: 'varchar', length: 256, unique: true })
  name!: string;

  @ApiProperty({ description: 'URL-safe identifier' })
  @Column({ type: 'varchar', length: 50, unique: true })
  slug!: string;

  @ManyToMany(() => Title, (title) => title.genres)
  titles!: Title[];
}
