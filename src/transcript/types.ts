export interface TranscriptionResult {
  text: string;
  language: string;
}

export interface Transcriber {
  transcribe(filePath: string): Promise<TranscriptionResult>;
}
