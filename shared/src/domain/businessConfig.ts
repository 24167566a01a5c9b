import { z } from 'zod';

// Бизнес-параметры пользователя: непрозрачный JSON (авиакомпания -> тип операции -> группа -> параметры).
// Сервер проверяет только то, что это объект, содержимое хранится как есть.

export type BusinessConfigData = Record<string, unknown>;

export type BusinessConfigDto = {
  id: string;
  user_id: string;
  config_data: BusinessConfigData;
  created_at: number;
  updated_at: number;
};

export const businessConfigBodySchema = z.object({
  config_data: z.record(z.string(), z.unknown()),
});

export type BusinessConfigBody = z.infer<typeof businessConfigBodySchema>;
