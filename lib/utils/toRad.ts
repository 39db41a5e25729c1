export function toRad(deg: number) {
  return (deg * Math.PI) / 180
}
