import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { IntelPipelineService } from './intel/services/intel-pipeline.service';

// Single scheduled run: ingest, score, exit.
async function runOnce(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const summary = await app.get(IntelPipelineService).runPipeline();
    Logger.log(
      `run ${summary.run.id} finished with status=${summary.run.status} intel=${summary.intel.length}`,
      'RunOnce',
    );
  } finally {
    await app.close();
  }
}

runOnce().catch((error: unknown) => {
  Logger.error(
    `run failed: ${error instanceof Error ? error.message : String(error)}`,
    'RunOnce',
  );
  process.exitCode = 1;
});
