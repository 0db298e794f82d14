export const EXAMPLE_QUESTIONS: readonly string[] = [
  "What is the derivative of sin(x^2)?",
  "Solve the equation 2x^2 + 3x - 5 = 0.",
  "What is the integral of 1 / (1 + x^2)?",
  "How do you find the area of a triangle given 3 sides?",
];
