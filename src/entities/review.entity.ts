import {
  Entity,
  PrimaryGeneratedColumn,
  ManyToOne,
  OneToMany,
  Column,
  Unique,
  CreateDateColumn,
  JoinColumn,
  Index,
} from 'typeorm';
import { Title } from './title.entity';
import { User } from './user.entity';
import { Comment } from './comment.entity';

export const REVIEW_UNIQUE_CONSTRAINT = 'uq_review_title_author';

@Entity()
@Unique(REVIEW_UNIQUE_CONSTRAINT, ['title', 'author'])
export class Review {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Title, (title) => title.reviews, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'title_id' })
  @Index()
  title!: Title;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'author_id' })
  author!: User;

  @Column({ type: 'text' })
  text!: string;

  @Column({ type: 'int' })
  score!: number; // 1-10

  @CreateDateColumn()
  pub_date!: Date;

  @OneToMany(() => Comment, (comment) => comment.review)
  comments!: Comment[];
}
