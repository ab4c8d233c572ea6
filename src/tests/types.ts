/**
 * Represents a single row of data in a table-driven test.
 *
 * @template TInput - The type of the input payload.
 * @template TExpected - The type of the expected result.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  /**
   * A short, unique identifier for the scenario.
   */
  id: string;

  /**
   * A human-readable explanation of the test logic and expected behavior.
   */
  description: string;

  /**
   * The input payload for the test case. Trees are passed as builder
   * functions so each run gets fresh nodes.
   */
  input: TInput;

  /**
   * The expected output from the function under test.
   */
  expected: TExpected;
};
