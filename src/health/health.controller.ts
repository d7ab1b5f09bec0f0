import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { DynamoDbHealthIndicator } from './indicators/dynamodb.health';
import { JobPoolHealthIndicator } from './indicators/job-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { ProcessingLoopsHealthIndicator } from './indicators/processing-loops.health';

const HEAP_LIMIT_BYTES = 500 * 1024 * 1024;
const RSS_LIMIT_BYTES = 1024 * 1024 * 1024;

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly dynamoDbHealth: DynamoDbHealthIndicator,
    private readonly jobPoolHealth: JobPoolHealthIndicator,
    private readonly diskSpaceHealth: DiskSpaceHealthIndicator,
    private readonly loopsHealth: ProcessingLoopsHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.jobPoolHealth.isHealthy('job_pool'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }

  @Get('ready')
  @HealthCheck()
  readiness() {
    return this.health.check([
      () => this.dynamoDbHealth.isHealthy('dynamodb'),
      () => this.jobPoolHealth.isHealthy('job_pool'),
      () => this.loopsHealth.isHealthy('processing'),
    ]);
  }

  @Get('detailed')
  @HealthCheck()
  detailed() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.dynamoDbHealth.isHealthy('dynamodb'),
      () => this.jobPoolHealth.isHealthy('job_pool'),
      () => this.loopsHealth.isHealthy('processing'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }
}
