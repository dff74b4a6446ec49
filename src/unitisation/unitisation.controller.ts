import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { UnitisationService } from './unitisation.service';
import { UnitisationReportService } from './unitisation-report.service';
import { ProcessUnitisationDto } from './dto/process-unitisation.dto';
import { UnitisationResponseDto } from './dto/unitisation-response.dto';
import { toNavByDate } from '../nav/nav-quote';

@Controller('unitisation')
export class UnitisationController {
  constructor(
    private readonly unitisationService: UnitisationService,
    private readonly reportService: UnitisationReportService,
  ) {}

  /**
   * Runs a subscription/redemption batch against per-date NAV per unit.
   * Fails as a whole on the first data-quality error.
   *
   * POST /unitisation/process
   * @returns 200 with ledger, investor summary and totals
   */
  @Post('process')
  @HttpCode(HttpStatus.OK)
  process(@Body() dto: ProcessUnitisationDto): UnitisationResponseDto {
    const result = this.unitisationService.process({
      openingUnits: dto.openingUnits,
      openingNavPerUnit: dto.openingNavPerUnit,
      transactions: dto.transactions,
      navByDate: toNavByDate(dto.navByDate),
    });

    return {
      runId: uuidv4(),
      ...this.reportService.buildReport(result),
    };
  }
}
