// src/main.ts
import 'reflect-metadata'; // 必须在最顶部导入，用于装饰器支持
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  // 启用全局验证管道
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: false, // 允许额外的属性
      transformOptions: {
        enableImplicitConversion: true, // 启用隐式类型转换
      },
    })
  );

  app.enableCors();

  // ============================================
  // 📚 Swagger/OpenAPI 文档配置
  // ============================================
  const config = new DocumentBuilder()
    .setTitle('Train Reservation API')
    .setDescription('车次座位库存与订票台账 API - 查询车次、订票、退票、时刻表')
    .setVersion('1.0')
    .addTag('reservations', '车次查询与订票相关接口')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document, {
    customSiteTitle: 'Train Reservation API 文档',
  });

  const port = app.get(ConfigService).get<string>('PORT', '3000');
  await app.listen(port);
  logger.log(`🚀 Application is running on: http://localhost:${port}`);
  logger.log(`📚 Swagger 文档: http://localhost:${port}/api`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
