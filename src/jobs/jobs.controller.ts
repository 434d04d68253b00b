import { Controller, Get, MessageEvent, NotFoundException, Param, ParseIntPipe, Query, Sse } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { exhaustMap, from, map, mergeMap, Observable, takeWhile, timer } from 'rxjs';

import { ListEventsQueryDto } from './dto/list-events-query.dto';
import { isTerminal, type JobEventRecord, type JobRecord } from './job.types';
import { JobFileStore } from './storage/job-store';

const STREAM_POLL_MS = 1000;

@ApiTags('jobs')
@Controller('jobs')
export class JobsController {
  constructor(private readonly store: JobFileStore) {}

  @Get('by-trigger/:triggerId')
  @ApiOperation({ summary: 'Look up the job created for a trigger comment' })
  @ApiOkResponse({ description: 'Job record' })
  async byTrigger(@Param('triggerId') triggerId: string): Promise<JobRecord> {
    const job = await this.store.byTrigger(triggerId);
    if (!job) {
      throw new NotFoundException(`No job for trigger ${triggerId}`);
    }
    return job;
  }

  @Get(':jobId')
  @ApiOperation({ summary: 'Get a job record' })
  @ApiOkResponse({ description: 'Job record' })
  async get(@Param('jobId', ParseIntPipe) jobId: number): Promise<JobRecord> {
    const job = await this.store.findById(jobId);
    if (!job) {
      throw new NotFoundException(`Job ${jobId} not found`);
    }
    return job;
  }

  @Get(':jobId/events')
  @ApiOperation({ summary: 'List the most recent events of a job' })
  @ApiOkResponse({ description: 'Events in the order they were recorded' })
  async events(
    @Param('jobId', ParseIntPipe) jobId: number,
    @Query() query: ListEventsQueryDto,
  ): Promise<JobEventRecord[]> {
    await this.get(jobId);
    return this.store.listEvents(jobId, query.take ?? 100);
  }

  /**
   * Polls the event log and completes once the job is terminal and its final
   * event has been sent, or one poll after it became terminal.
   */
  @Sse(':jobId/stream')
  @ApiOperation({ summary: 'Stream job events as server-sent events' })
  stream(@Param('jobId', ParseIntPipe) jobId: number): Observable<MessageEvent> {
    const seen = new Set<string>();
    let terminalPolls = 0;
    return timer(0, STREAM_POLL_MS).pipe(
      exhaustMap(() => from(this.snapshot(jobId))),
      takeWhile(({ job, events }) => {
        if (!job || !isTerminal(job)) {
          return true;
        }
        const finalType = job.status;
        terminalPolls += 1;
        return terminalPolls < 2 && !events.some((event) => event.type === finalType);
      }, true),
      mergeMap(({ events }) =>
        from(
          events.filter((event) => {
            if (seen.has(event.id)) return false;
            seen.add(event.id);
            return true;
          }),
        ),
      ),
      map((event): MessageEvent => ({ id: event.id, type: event.type, data: event })),
    );
  }

  private async snapshot(jobId: number): Promise<{ job: JobRecord | null; events: JobEventRecord[] }> {
    const job = await this.store.findById(jobId);
    return { job, events: await this.store.listEvents(jobId) };
  }
}
