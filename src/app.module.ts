import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ChargeFlowModule, chargeFlowConfigFromEnv } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ChargeFlowModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => chargeFlowConfigFromEnv(config),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
