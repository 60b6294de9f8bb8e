import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Title } from '../../entities/title.entity';
import { Category } from '../../entities/category.entity';
import { Genre } from '../../entities/genre.entity';
import { Review } from '../../entities/review.entity';
import { AccessModule } from '../access/access.module';
import { TitlesController } from './titles.controller';
import { TitlesService } from './titles.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Title, Category, Genre, Review]),
    AccessModule,
  ],
  controllers: [TitlesController],
  providers: [TitlesService],
  exports: [TitlesService],
})
export class TitlesModule {}
