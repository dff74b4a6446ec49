import { Module } from '@nestjs/common';
import { UnitisationController } from './unitisation.controller';
import { UnitisationService } from './unitisation.service';
import { UnitisationReportService } from './unitisation-report.service';
import { TransactionNormalizerService } from './transaction-normalizer.service';

@Module({
  controllers: [UnitisationController],
  providers: [
    TransactionNormalizerService,
    UnitisationService,        // Engine: ledger fold, balance checks
    UnitisationReportService,  // View: rounding for emission
  ],
})
export class UnitisationModule {}
