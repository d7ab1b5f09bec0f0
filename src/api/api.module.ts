import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { TasksController } from './tasks.controller';

@Module({
  imports: [ApplicationModule],
  controllers: [TasksController],
})
export class ApiModule {}
