import { User } from './user.entity';
import { Category } from './category.entity';
import { Genre } from './genre.entity';
import { Title } from './title.entity';
import { Review } from './review.entity';
import { Comment } from './comment.entity';

export const ENTITIES = [User, Category, Genre, Title, Review, Comment];
