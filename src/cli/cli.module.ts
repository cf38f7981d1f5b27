import { Module } from '@nestjs/common';
import { MetricsModule } from '../metrics/metrics.module';
import { SmartplugCommand } from './smartplug.command';

@Module({
  imports: [MetricsModule],
  providers: [SmartplugCommand],
  exports: [SmartplugCommand],
})
export class CliModule {}
