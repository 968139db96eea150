/**
 * Form Submission
 *
 * Fixed-format request body for the portal's forms. Fields are written as
 * `name=value` pairs joined by `&`, in insertion order, with NO
 * percent-encoding: values go out as given and the whole body is then
 * transcoded to Shift_JIS. Some action captions are passed in already
 * percent-encoded (see ACTION_CAPTIONS) and must reach the portal as those
 * literal bytes, which a standard URL encoder would double-encode.
 *
 * Some portal forms are sensitive to which fields are present and in what
 * order, so the builder never sorts or deduplicates.
 */
import { toLegacy } from "../session/encoding-bridge";

export class FormSubmission {
  private readonly entries: Array<[string, string]> = [];

  /**
   * Set a field. An existing field keeps its position and takes the new value.
   */
  set(name: string, value: string): this {
    const existing = this.entries.find(([key]) => key === name);
    if (existing) {
      existing[1] = value;
    } else {
      this.entries.push([name, value]);
    }
    return this;
  }

  /** Add a field even if the name is already present */
  append(name: string, value: string): this {
    this.entries.push([name, value]);
    return this;
  }

  get(name: string): string | undefined {
    return this.entries.find(([key]) => key === name)?.[1];
  }

  has(name: string): boolean {
    return this.entries.some(([key]) => key === name);
  }

  names(): string[] {
    return this.entries.map(([key]) => key);
  }

  get size(): number {
    return this.entries.length;
  }

  /** The body as native text */
  toString(): string {
    return this.entries.map(([key, value]) => `${key}=${value}`).join("&");
  }

  /**
   * The body as Shift_JIS bytes.
   *
   * @throws EncodingError if a value holds a character the portal cannot take
   */
  encode(): Buffer {
    return toLegacy(this.toString());
  }
}
