import Joi from 'joi';

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Engine base URL must be origin-only (no path) so engine routes map 1:1.
  OCR_ENGINE_BASE_URL: Joi.string()
    .uri()
    .required()
    .custom((value, helpers) => {
      try {
        const parsed = new URL(value);
        if (parsed.pathname && parsed.pathname !== '/') {
          return helpers.error('any.custom');
        }
        return value;
      } catch {
        return helpers.error('any.custom');
      }
    }, 'Base URL validation')
    .messages({
      'any.custom': 'OCR_ENGINE_BASE_URL must not include a path',
    }),
  // Engine calls are slow; keep the timeout generous.
  OCR_ENGINE_TIMEOUT: Joi.number().integer().min(100).default(60000),
  // Retries only apply to GET requests (see HttpClientService).
  OCR_ENGINE_RETRIES: Joi.number().integer().min(0).max(5).default(0),
  // Max JSON body size in bytes (default 10MB, base64 images) enforced by Fastify.
  UPLOAD_BODY_LIMIT: Joi.number().integer().min(1024).default(10485760),
  API_KEYS_FILE: Joi.string().default('data/api_keys.json'),
  // Zero means unlimited for that window.
  API_KEYS_DEFAULT_RATE_LIMIT_PER_MINUTE: Joi.number().integer().min(0).default(60),
  API_KEYS_DEFAULT_RATE_LIMIT_PER_DAY: Joi.number().integer().min(0).default(1000),
  ADMIN_USERNAME: Joi.string().default('admin'),
  ADMIN_PASSWORD: Joi.string().required(),
  ADMIN_SESSION_SECRET: Joi.string().min(16).required(),
  ADMIN_SESSION_TTL_SECONDS: Joi.number().integer().positive().default(604800),
  ADMIN_LOGIN_RATE_LIMIT_PER_MINUTE: Joi.number().integer().positive().default(5),
});
