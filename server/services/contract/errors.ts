export class DecodeError extends Error {
  constructor(message = "Uploaded file is not valid UTF-8 text") {
    super(message);
    this.name = "DecodeError";
  }
}

export class UnsupportedFormatError extends Error {
  constructor(format: string) {
    super(`Unsupported file type: ${format || "unknown"}`);
    this.name = "UnsupportedFormatError";
  }
}
