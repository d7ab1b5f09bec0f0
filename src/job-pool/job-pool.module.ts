import { Module } from '@nestjs/common';
import { JobPoolService } from './job-pool.service';

@Module({
  providers: [JobPoolService],
  exports: [JobPoolService],
})
export class JobPoolModule {}
