/** A memory proposed by a producer; nothing here is trusted until normalised. */
export interface MemoryCandidate {
  content: string;
  category?: string;
  importance?: number;
  confidence?: number;
  tags?: string[];
}

export interface CandidateProducer {
  produce(transcript: string): Promise<MemoryCandidate[]>;
}
