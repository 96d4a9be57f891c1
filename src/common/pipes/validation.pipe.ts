import { ValidationPipe } from '@nestjs/common';

// Shared by bootstrap and the DTO specs so both see the same rules.
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  });
}
