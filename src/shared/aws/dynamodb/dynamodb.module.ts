import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';
import { DynamoDbService } from './dynamodb.service';

@Module({
  providers: [
    {
      provide: DynamoDBClient,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const awsConfig = configService.get('aws', { infer: true });
        return new DynamoDBClient({
          region: awsConfig.region,
          ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
          ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
        });
      },
    },
    {
      provide: DynamoDBDocumentClient,
      inject: [DynamoDBClient],
      useFactory: (client: DynamoDBClient) =>
        DynamoDBDocumentClient.from(client, {
          marshallOptions: {
            removeUndefinedValues: true,
          },
        }),
    },
    DynamoDbService,
  ],
  exports: [DynamoDbService],
})
export class DynamoDbModule {}
