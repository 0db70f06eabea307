const isSilent = (): boolean => process.env.NODE_ENV === 'test';

export class Logger {
  static info(message: string, meta?: unknown): void {
    if (isSilent()) return;
    console.log(`ℹ️  [INFO] ${message}`, meta ?? '');
  }

  static success(message: string, meta?: unknown): void {
    if (isSilent()) return;
    console.log(`✅ [SUCCESS] ${message}`, meta ?? '');
  }

  static warning(message: string, meta?: unknown): void {
    if (isSilent()) return;
    console.warn(`⚠️  [WARNING] ${message}`, meta ?? '');
  }

  static error(message: string, error?: unknown): void {
    if (isSilent()) return;
    console.error(`❌ [ERROR] ${message}`, error ?? '');
  }

  static debug(message: string, meta?: unknown): void {
    if (process.env.NODE_ENV === 'development') {
      console.log(`🐛 [DEBUG] ${message}`, meta ?? '');
    }
  }
}
