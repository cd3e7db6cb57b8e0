export class SegmentNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SegmentNotFoundError';
  }
}

export class PresetNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PresetNotFoundError';
  }
}

export class InvalidSegmentNameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSegmentNameError';
  }
}

export class EmptySegmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptySegmentError';
  }
}

export class InvalidPresetParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPresetParamsError';
  }
}

export class SegmentStoreError extends Error {
  override readonly name = 'SegmentStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
