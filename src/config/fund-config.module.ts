import { Global, Module } from '@nestjs/common';
import { FUND_CONFIG, loadFundConfig } from './fund.config';

@Global()
@Module({
  providers: [{ provide: FUND_CONFIG, useFactory: () => loadFundConfig() }],
  exports: [FUND_CONFIG],
})
export class FundConfigModule {}
