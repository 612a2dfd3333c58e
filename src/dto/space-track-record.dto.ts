/**
 * A single row of Space-Track's GP class, as returned by
 * /basicspacedata/query/class/gp/.../format/json.
 * The provider serves most numeric fields as strings.
 */
export type RawFieldValue = string | number | boolean | null;

export interface RawTrackingRecord {
  NORAD_CAT_ID?: RawFieldValue;
  OBJECT_NAME?: RawFieldValue;
  COUNTRY_CODE?: RawFieldValue;
  MEAN_MOTION?: RawFieldValue;
  ECCENTRICITY?: RawFieldValue;
  APOGEE?: RawFieldValue;
  PERIGEE?: RawFieldValue;
  RCS_SIZE?: RawFieldValue;
  LAUNCH_DATE?: RawFieldValue;
  EPOCH?: RawFieldValue;
  // Additional fields, e.g. INCLINATION, OBJECT_TYPE, TLE_LINE1...
  [field: string]: unknown;
}
