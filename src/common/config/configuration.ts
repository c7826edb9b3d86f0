const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  port: toInt(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  elevenlabs: {
    // 服务端默认 key，浏览器会话可以自行提供
    apiKey: process.env.ELEVENLABS_API_KEY || '',
    baseUrl: process.env.ELEVENLABS_BASE_URL || 'https://api.elevenlabs.io/v1',
    modelId: process.env.ELEVENLABS_MODEL_ID || 'scribe_v2',
    languageCode: process.env.ELEVENLABS_LANGUAGE_CODE || 'en',
  },

  // 业务配置
  batch: {
    maxFiles: toInt(process.env.BATCH_MAX_FILES, 5), // 单次最多处理的文件数
    allowedExtensions: ['mp3', 'wav'],
  },

  upload: {
    maxFileSizeMb: toInt(process.env.UPLOAD_MAX_FILE_SIZE_MB, 100),
  },

  demo: {
    delayMs: toInt(process.env.DEMO_DELAY_MS, 1500), // 演示模式模拟处理耗时
  },

  session: {
    ttlMinutes: toInt(process.env.SESSION_TTL_MINUTES, 120), // 闲置超过此时长的会话被清理
  },
});
