import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('ChargeFlow Payment Command Engine')
    .setDescription(
      'One-off charges, refunds by undo, and scheduled recurring billing against a simulated gateway.',
    )
    .setVersion('0.1.0')
    .addTag('Payments', 'Charge, refund and list payments')
    .addTag('Subscriptions', 'Recurring charges and their lifecycle')
    .addTag('Health', 'Liveness, readiness and statistics')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4010;
  await app.listen(port, () => {
    console.log(
      `🚀 ChargeFlow Payment Command Engine is running on http://localhost:${port}`,
    );
    console.log(
      `📚 OpenAPI documentation available at http://localhost:${port}/api`,
    );
  });
}
void bootstrap();
