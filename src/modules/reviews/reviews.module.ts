import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Review } from '../../entities/review.entity';
import { Comment } from '../../entities/comment.entity';
import { Title } from '../../entities/title.entity';
import { AccessModule } from '../access/access.module';
import { ReviewsController } from './reviews.controller';
import { ReviewsService } from './reviews.service';
import { CommentsController } from './comments.controller';
import { CommentsService } from './comments.service';

@Module({
  imports: [TypeOrmModule.forFeature([Review, Comment, Title]), AccessModule],
  controllers: [ReviewsController, CommentsController],
  providers: [ReviewsService, CommentsService],
})
export class ReviewsModule {}
