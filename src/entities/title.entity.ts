import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  ManyToMany,
  ManyToOne,
  JoinTable,
  JoinColumn,
  OneToMany,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Category } from './category.entity';
import { Genre } from './genre.entity';
import { Review } from './review.entity';

@Entity()
export class Title {
  @ApiProperty({ description: 'Title ID' })
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ description: 'Name of the work' })
  @Column({ type: 'text' })
  name!: string;

  @ApiProperty({ description: 'Release year' })
  @Column({ type: 'int' })
  year!: number;

  @ApiProperty({ description: 'Description', required: false, nullable: true })
  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @ApiProperty({ type: () => Category, nullable: true })
  @ManyToOne(() => Category, (category) => category.titles, {
    nullable: true,
    onDelete: 'SET NULL',
  })
  @JoinColumn({ name: 'category_id' })
  category!: Category | null;

  @ApiProperty({ type: () => [Genre] })
  @ManyToMany(() => Genre, (genre) => genre.titles)
  @JoinTable({
    name: 'title_genres',
    joinColumn: { name: 'title_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'genre_id', referencedColumnName: 'id' },
  })
  genres!: Genre[];

  @OneToMany(() => Review, (review) => review.title)
  reviews!: Review[];
}
