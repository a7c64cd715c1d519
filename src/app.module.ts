import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BatchService } from './batch/batch.service';
import { TrimCommand } from './cli/trim.command';
import { validateEnv } from './config/env.validation';
import { FfmpegCliStrategy } from './ffmpeg/ffmpeg-cli.strategy';
import { FluentFfmpegStrategy } from './ffmpeg/fluent-ffmpeg.strategy';
import { ProcessRunner } from './ffmpeg/process-runner.service';
import { ToolchainService } from './ffmpeg/toolchain.service';
import { OutputPathService } from './trim/output-path.service';
import { TrimService } from './trim/trim.service';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateEnv })],
  providers: [
    ProcessRunner,
    FfmpegCliStrategy,
    FluentFfmpegStrategy,
    ToolchainService,
    OutputPathService,
    TrimService,
    BatchService,
    TrimCommand,
  ],
})
export class AppModule {}
