/**
 * Example of rate limiting controller handlers with @RateLimit()
 */
import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { RateLimit } from '../src';

interface ReportRequest {
  title: string;
  pages: number;
}

// Every handler draws one token from 'report-generation' by default
@RateLimit({ bucket: 'report-generation', maxWaitMs: 1000 })
@Controller('reports')
export class ReportController {
  @Get(':id')
  async findOne(@Param('id') id: string) {
    return { id };
  }

  // Generating costs more and may be held back for up to 3 seconds
  // before a 429 is returned
  @Post()
  @RateLimit({ bucket: 'report-generation', count: 5, maxWaitMs: 3000 })
  async generate(@Body() request: ReportRequest) {
    return { title: request.title, status: 'queued' };
  }
}
