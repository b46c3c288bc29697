import {
  Controller,
  Get,
  Post,
  HttpCode,
  HttpStatus,
  ConflictException,
  NotFoundException,
  Inject,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ReconciliationReport } from '../../../core';
import {
  ApiRunReconciliation,
  ApiLastReconciliation,
} from '../../../_shared/swagger/decorators';
import { ReconciliationScheduler } from '../services/reconciliation.scheduler';

@ApiTags('Reconciliation')
@Controller('reconciliation')
export class ReconciliationController {
  constructor(
    @Inject(ReconciliationScheduler)
    private readonly scheduler: ReconciliationScheduler,
  ) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @ApiRunReconciliation()
  async run(): Promise<ReconciliationReport> {
    const report = await this.scheduler.runOnce();
    if (!report) {
      throw new ConflictException('Reconciliation already running');
    }
    return report;
  }

  @Get('last')
  @ApiLastReconciliation()
  last(): ReconciliationReport {
    const report = this.scheduler.getLastReport();
    if (!report) {
      throw new NotFoundException('No reconciliation run has completed yet');
    }
    return report;
  }
}
