import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { IntelModule } from './intel/intel.module';

@Module({
  imports: [IntelModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
