import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DatabaseConfig } from '../../config/database.config';
import { DatabaseInitService } from '../../config/database-init.service';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';
import { CatalogModule } from '../catalog/catalog.module';
import { TitlesModule } from '../titles/titles.module';
import { ReviewsModule } from '../reviews/reviews.module';

// shared with the e2e test module, which swaps only the database
export const FEATURE_MODULES = [
  AuthModule,
  UsersModule,
  CatalogModule,
  TitlesModule,
  ReviewsModule,
];

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      useClass: DatabaseConfig,
    }),
    ...FEATURE_MODULES,
  ],
  controllers: [AppController],
  providers: [AppService, DatabaseInitService],
})
export class AppModule {}
