import { Module } from '@nestjs/common';
import { CommandsModule } from '../commands/commands.module';
import { DeviceModule } from '../device/device.module';
import { SenderModule } from '../sender/sender.module';
import { MetricExtractionService } from './metric-extraction.service';
import { ModelCatalogService } from './model-catalog.service';
import { SmartplugPreflightService } from './smartplug-preflight.service';
import { SmartplugRunService } from './smartplug-run.service';

/**
 * MetricsModule
 *
 * Metric extraction and dispatch for one smart plug:
 * - ModelCatalogService: line budgets and model-specific metrics
 * - SmartplugPreflightService: checks before anything is sent
 * - MetricExtractionService: reads and forwards a single metric
 * - SmartplugRunService: the full pass over catalog and extensions
 */
@Module({
  imports: [CommandsModule, DeviceModule, SenderModule],
  providers: [
    ModelCatalogService,
    SmartplugPreflightService,
    MetricExtractionService,
    SmartplugRunService,
  ],
  exports: [SmartplugRunService],
})
export class MetricsModule {}
