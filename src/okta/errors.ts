export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ResolutionError extends Error {
  public readonly label: string;

  public constructor(message: string, label: string) {
    super(message);
    this.name = 'ResolutionError';
    this.label = label;
  }
}

export class OktaApiError extends Error {
  public readonly url: string;
  public readonly status: number;
  public readonly body: string;

  public constructor(url: string, status: number, body: string) {
    super(`GET ${url} -> ${status} ${body}`);
    this.name = 'OktaApiError';
    this.url = url;
    this.status = status;
    this.body = body;
  }
}
