/**
 * Collects the text content of the one element kind whose value is carried
 * as content (`<Name>`). Fragments arrive in arbitrary pieces and are joined
 * in arrival order.
 */
export class CharacterData {
  private fragments: string[] | null = null;
  private recording = false;

  public get isRecording(): boolean {
    return this.recording;
  }

  public start(): void {
    this.recording = true;
  }

  public stop(): void {
    this.recording = false;
  }

  public append(fragment: string): void {
    if (!this.recording) return;
    if (this.fragments === null) {
      // An empty element can be reported as a lone newline; it stands for "".
      this.fragments = [fragment === '\n' ? '' : fragment];
      return;
    }
    this.fragments.push(fragment);
  }

  /**
   * The accumulated text ("" when nothing arrived). Clears the buffer.
   */
  public take(): string {
    const text = this.fragments ? this.fragments.join('') : '';
    this.fragments = null;
    return text;
  }

  public reset(): void {
    this.fragments = null;
    this.recording = false;
  }
}
