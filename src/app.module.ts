import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CliModule } from './cli/cli.module';
import { validateEnvironment } from './config/smartplug.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    CliModule,
  ],
})
export class AppModule {}
