/**
 * CPCB (India) AQI categories.
 *
 * 0-50     Good          Minimal impact.
 * 51-100   Satisfactory  Minor breathing discomfort to sensitive people.
 * 101-200  Moderate      Breathing discomfort to people with lung or heart disease, children and older adults.
 * 201-300  Poor          Breathing discomfort to most people on prolonged exposure.
 * 301-400  Very Poor     Respiratory illness on prolonged exposure.
 * 401+     Severe        Affects healthy people and seriously impacts those with existing diseases.
 *
 * Sub-indices above 500 are possible: concentrations beyond the last
 * breakpoint are extrapolated, and those readings stay "Severe".
 */

export interface AqiCategory {
  level: string;
  description: string;
  color: string;
}

const AQI_CATEGORIES: ReadonlyArray<AqiCategory & { max: number }> = [
  {
    max: 50,
    level: "Good",
    description: "Minimal impact.",
    color: "green",
  },
  {
    max: 100,
    level: "Satisfactory",
    description: "Minor breathing discomfort to sensitive people.",
    color: "lightgreen",
  },
  {
    max: 200,
    level: "Moderate",
    description:
      "Breathing discomfort to people with lung disease such as asthma, and discomfort to people with heart disease, children and older adults.",
    color: "yellow",
  },
  {
    max: 300,
    level: "Poor",
    description:
      "Breathing discomfort to people on prolonged exposure, and discomfort to people with heart disease.",
    color: "orange",
  },
  {
    max: 400,
    level: "Very Poor",
    description:
      "Respiratory illness to the people on prolonged exposure. Effect may be more pronounced in people with lung and heart diseases.",
    color: "red",
  },
  {
    max: Infinity,
    level: "Severe",
    description:
      "Respiratory effects even on healthy people, and serious health impacts on people with lung/heart disease.",
    color: "maroon",
  },
];

// Get descriptive category for AQI value
export function getAqiCategory(aqi: number | null): AqiCategory | null {
  if (aqi === null) return null;

  const match =
    AQI_CATEGORIES.find((category) => aqi <= category.max) ??
    AQI_CATEGORIES[AQI_CATEGORIES.length - 1];
  return {
    level: match.level,
    description: match.description,
    color: match.color,
  };
}
