/** Fixed-width pieces of a record, in line order. */
export interface LineFields {
  total: string;
  usaf: string;
  wban: string;
  dt: string;
  source: string;
  latitude: string;
  longitude: string;
  reportType: string;
  elevation: string;
  callLetters: string;
  qc: string;
  windDirection: string;
  windDirectionQuality: string;
  windType: string;
  windSpeed: string;
  windSpeedQuality: string;
  ceiling: string;
  ceilingQuality: string;
  ceilingDetermination: string;
  cavok: string;
  visibility: string;
  visibilityQuality: string;
  visibilityVariability: string;
  visibilityVariabilityQuality: string;
  temperature: string;
  temperatureQuality: string;
  dewPoint: string;
  dewPointQuality: string;
  pressure: string;
  pressureQuality: string;
}

export const BASE_FIELDS: LineFields = {
  total: "0185",
  usaf: "720534",
  wban: "00161",
  dt: "202501010015",
  source: "4",
  latitude: "+40017",
  longitude: "-105050",
  reportType: "FM-15",
  elevation: "+1564",
  callLetters: "99999",
  qc: "V020",
  windDirection: "060",
  windDirectionQuality: "1",
  windType: "N",
  windSpeed: "0015",
  windSpeedQuality: "1",
  ceiling: "22000",
  ceilingQuality: "5",
  ceilingDetermination: "9",
  cavok: "N",
  visibility: "016093",
  visibilityQuality: "1",
  visibilityVariability: "9",
  visibilityVariabilityQuality: "9",
  temperature: "-0015",
  temperatureQuality: "1",
  dewPoint: "-0083",
  dewPointQuality: "1",
  pressure: "10212",
  pressureQuality: "1",
};

/** A 105-character record built from `BASE_FIELDS` with the given overrides. */
export function isdLine(overrides: Partial<LineFields> = {}): string {
  const f = { ...BASE_FIELDS, ...overrides };
  return [
    f.total,
    f.usaf,
    f.wban,
    f.dt,
    f.source,
    f.latitude,
    f.longitude,
    f.reportType,
    f.elevation,
    f.callLetters,
    f.qc,
    f.windDirection,
    f.windDirectionQuality,
    f.windType,
    f.windSpeed,
    f.windSpeedQuality,
    f.ceiling,
    f.ceilingQuality,
    f.ceilingDetermination,
    f.cavok,
    f.visibility,
    f.visibilityQuality,
    f.visibilityVariability,
    f.visibilityVariabilityQuality,
    f.temperature,
    f.temperatureQuality,
    f.dewPoint,
    f.dewPointQuality,
    f.pressure,
    f.pressureQuality,
  ].join("");
}
