import { INestApplication, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

/** Shared by bootstrap and the e2e tests */
export function configureApp(app: INestApplication): void {
  app.enableCors({
    origin: '*',
    methods: 'GET,OPTIONS',
    allowedHeaders: 'Content-Type, Authorization',
  });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const config = new DocumentBuilder()
    .setTitle('Space Debris Relay API')
    .setDescription('Recent low-orbit objects from Space-Track.org, simplified for visualization')
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);
}
