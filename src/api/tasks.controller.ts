import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { SubmitJobUseCase } from '../application/use-cases/submit-job.use-case';
import { QueryJobsUseCase } from '../application/use-cases/query-jobs.use-case';
import { OverrideJobStatusUseCase } from '../application/use-cases/override-job-status.use-case';
import { InvalidStatusChangeError, JobNotFoundError } from '../domain/errors/job.errors';
import { JobStatus } from '../domain/value-objects/job-status.vo';
import { ZodValidationPipe } from './zod-validation.pipe';
import {
  JobResponse,
  ListTasksQuery,
  ListTasksResponse,
  SubmitTaskDto,
  SubmitTaskResponse,
  UpdateStatusDto,
  listTasksQuerySchema,
  submitTaskSchema,
  toJobResponse,
  updateStatusSchema,
} from './dto';

export interface TaskStatsResponse {
  pending: number;
  executing: number;
  completed: number;
  failed: number;
}

function toHttpError(error: unknown): unknown {
  if (error instanceof JobNotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof InvalidStatusChangeError) {
    return new BadRequestException(error.message);
  }
  return error;
}

@Controller('api')
export class TasksController {
  constructor(
    private readonly submitJob: SubmitJobUseCase,
    private readonly queryJobs: QueryJobsUseCase,
    private readonly overrideJobStatus: OverrideJobStatusUseCase,
  ) {}

  @Post('task/bili')
  @HttpCode(HttpStatus.OK)
  async submit(
    @Body(new ZodValidationPipe(submitTaskSchema)) body: SubmitTaskDto,
  ): Promise<SubmitTaskResponse> {
    const result = await this.submitJob.execute({
      itemId: body.bid,
      collectionId: body.favid,
      selectedParts: body.selectedParts,
      nameTemplate: body.nameTemplate,
    });

    return {
      status: result.outcome === 'created' ? 'success' : 'updated',
      message: result.message,
    };
  }

  @Get('tasks/status')
  async stats(): Promise<TaskStatsResponse> {
    const stats = await this.queryJobs.stats();
    return {
      pending: stats[JobStatus.PENDING],
      executing: stats[JobStatus.EXECUTING],
      completed: stats[JobStatus.COMPLETED],
      failed: stats[JobStatus.FAILED],
    };
  }

  @Get('tasks')
  async list(
    @Query(new ZodValidationPipe(listTasksQuerySchema)) query: ListTasksQuery,
  ): Promise<ListTasksResponse> {
    const page = await this.queryJobs.list({
      page: query.page,
      pageSize: query.page_size,
      status: query.status,
    });

    return {
      items: page.items.map(toJobResponse),
      total: page.total,
      page: page.page,
      page_size: page.pageSize,
    };
  }

  @Get('tasks/:id')
  async getOne(@Param('id') id: string): Promise<JobResponse> {
    try {
      return toJobResponse(await this.queryJobs.getById(id));
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Put('tasks/:id/status')
  async updateStatus(
    @Param('id') id: string,
    @Body(new ZodValidationPipe(updateStatusSchema)) body: UpdateStatusDto,
  ): Promise<JobResponse> {
    try {
      const job = await this.overrideJobStatus.execute({
        jobId: id,
        status: body.status,
        errorMessage: body.error_message,
      });
      return toJobResponse(job);
    } catch (error) {
      throw toHttpError(error);
    }
  }
}
