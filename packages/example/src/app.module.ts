import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DetectorModule } from 'nestjs-blocking-detector';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { FormulaHandlerService } from './formula-handler.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),

    DetectorModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        formulaIds: configService
          .get<string>('FORMULA_IDS', 'formula-cpu,formula-ram')
          .split(',')
          .map((id) => id.trim())
          .filter((id) => id.length > 0),
        supervisionOptions: {
          interval: parseInt(configService.get<string>('SUPERVISION_INTERVAL', '1000'), 10),
        },
      }),
      inject: [ConfigService],
    }),
  ],
  controllers: [AppController],
  providers: [AppService, FormulaHandlerService],
})
export class AppModule {}
