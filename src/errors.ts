// Ошибки реранкера, различаемые вызывающим кодом.

// Неверная конфигурация: неизвестная метрика, недопустимые параметры.
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Входная запись не содержит полей, нужных выбранной метрике.
export class RecordSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordSchemaError';
  }
}
