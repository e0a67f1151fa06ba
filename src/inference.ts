// Audio Violence Analyzer - Inference collaborator interfaces
//
// The five models are external collaborators. The orchestrator only depends
// on these shapes; concrete adapters live in energy-vad.ts, transcriber.ts,
// toxicity-scorer.ts and model-server-client.ts. Every waveform is mono float
// at the configured sample rate.

export interface SpeechTimestamp {
  start: number; // seconds from chunk start
  end: number;
}

export interface VoiceActivityResult {
  speechProbability: number;
  speechTimestamps: SpeechTimestamp[];
}

export interface VoiceActivityDetector {
  detect(waveform: Float32Array, sampleRate: number): Promise<VoiceActivityResult>;
}

/** Per-class confidence over the classifier's sound-event taxonomy, keyed by display name. */
export type ClassConfidences = Record<string, number>;

export interface AcousticEventClassifier {
  classify(waveform: Float32Array, sampleRate: number): Promise<ClassConfidences>;
}

export interface TranscriptionResult {
  text: string;
  confidence: number;
}

export interface Transcriber {
  transcribe(waveform: Float32Array, sampleRate: number): Promise<TranscriptionResult>;
}

/** Toxicity category scores, e.g. { toxic, severe_toxic, threat, insult, ... }. */
export type CategoryScores = Record<string, number>;

export interface ToxicityScorer {
  score(text: string): Promise<CategoryScores>;
}

/** Per-emotion scores, e.g. { neutral, happy, angry, sad, fear }. */
export type EmotionScores = Record<string, number>;

export interface EmotionClassifier {
  classify(waveform: Float32Array, sampleRate: number): Promise<EmotionScores>;
}

export interface InferenceCollaborators {
  vad: VoiceActivityDetector;
  acoustic: AcousticEventClassifier;
  transcriber: Transcriber;
  toxicity: ToxicityScorer;
  emotion: EmotionClassifier;
}
