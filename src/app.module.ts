import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { FundConfigModule } from './config/fund-config.module';
import { NavModule } from './nav/nav.module';
import { UnitisationModule } from './unitisation/unitisation.module';

@Module({
  imports: [FundConfigModule, NavModule, UnitisationModule],
  controllers: [AppController],
})
export class AppModule {}
