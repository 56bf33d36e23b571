import 'dotenv/config';

export const config = {
  port: parseInt(process.env.PORT || '3002', 10),
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
} as const;
