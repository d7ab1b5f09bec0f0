import { Module } from '@nestjs/common';
import { DynamoDbModule } from './dynamodb/dynamodb.module';

@Module({
  imports: [DynamoDbModule],
  exports: [DynamoDbModule],
})
export class AwsModule {}
