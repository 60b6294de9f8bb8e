import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Category } from '../../entities/category.entity';
import { Genre } from '../../entities/genre.entity';
import { AccessModule } from '../access/access.module';
import { CategoriesController } from './categories.controller';
import { CategoriesService } from './categories.service';
import { GenresController } from './genres.controller';
import { GenresService } from './genres.service';

@Module({
  imports: [TypeOrmModule.forFeature([Category, Genre]), AccessModule],
  controllers: [CategoriesController, GenresController],
  providers: [CategoriesService, GenresService],
  exports: [CategoriesService, GenresService],
})
export class CatalogModule {}
