import { ClassifiedLine } from '../../types/lines';

/**
 * Interface for classifying test runner output, one line at a time
 */
export interface OutputParser {
  /**
   * Classify a single line of output. Lines matching no known shape come back
   * as `text`; classification never throws.
   */
  classifyLine(line: string): ClassifiedLine;
}
