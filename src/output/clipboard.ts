import clipboardy from "clipboardy";

export interface ClipboardWriter {
  writeText(text: string): Promise<void>;
}

export const systemClipboard: ClipboardWriter = {
  writeText: (text) => clipboardy.write(text)
};
