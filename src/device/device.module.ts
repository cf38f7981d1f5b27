import { Module } from '@nestjs/common';
import { CommandsModule } from '../commands/commands.module';
import { KasaClient } from './kasa.client';

@Module({
  imports: [CommandsModule],
  providers: [KasaClient],
  exports: [KasaClient],
})
export class DeviceModule {}
