import { Module } from '@nestjs/common';
import { AccessPolicy } from './access-policy.service';
import { AccessGuard } from './access.guard';

@Module({
  providers: [AccessPolicy, AccessGuard],
  exports: [AccessPolicy, AccessGuard],
})
export class AccessModule {}
