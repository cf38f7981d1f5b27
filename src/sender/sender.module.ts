import { Module } from '@nestjs/common';
import { CommandsModule } from '../commands/commands.module';
import { ZabbixSenderService } from './zabbix-sender.service';

@Module({
  imports: [CommandsModule],
  providers: [ZabbixSenderService],
  exports: [ZabbixSenderService],
})
export class SenderModule {}
