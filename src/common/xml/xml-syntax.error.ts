export class XmlSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message);
    this.name = 'XmlSyntaxError';
  }
}
