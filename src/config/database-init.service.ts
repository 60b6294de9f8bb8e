import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { User } from '../entities/user.entity';

@Injectable()
export class DatabaseInitService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseInitService.name);

  constructor(
    @InjectDataSource()
    private dataSource: DataSource,
    private configService: ConfigService,
  ) {}

  async onModuleInit() {
    if (this.configService.get<string>('NODE_ENV') === 'test') {
      this.logger.log('Skipping database initialization in test environment');
      return;
    }
    await this.initializeDatabase();
  }

  private async initializeDatabase() {
    try {
      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
        this.logger.log('Database connection initialized');
      }
      await this.dataSource.runMigrations();
      this.logger.log('Database migrations completed');
      await this.seedInitialData();
    } catch (error) {
      this.logger.error('Failed to initialize database:', error);
      throw error;
    }
  }

  /**
   * Ensures a superuser exists so that roles can be handed out. The account
   * signs in like any other: through signup and the mailed confirmation code.
   * Seeding failures are logged and never block startup.
   */
  async seedInitialData(): Promise<void> {
    try {
      const userRepo = this.dataSource.getRepository(User);
      const username = this.configService.get<string>('ADMIN_USERNAME', 'admin');
      const email = this.configService.get<string>(
        'ADMIN_EMAIL',
        'admin@example.com',
      );

      const existing = await userRepo
        .createQueryBuilder('u')
        .where('LOWER(u.username) = LOWER(:username)', { username })
        .getOne();
      if (existing) {
        if (!existing.is_superuser || existing.role !== 'admin') {
          existing.is_superuser = true;
          existing.role = 'admin';
          await userRepo.save(existing);
          this.logger.log(`Promoted ${username} to superuser`);
        }
        return;
      }

      await userRepo.save(
        userRepo.create({ username, email, role: 'admin', is_superuser: true }),
      );
      this.logger.log(`System admin created: username=${username}`);
    } catch (error) {
      this.logger.error('Failed to seed initial data:', error);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Database health check failed:', error);
      return false;
    }
  }
}
