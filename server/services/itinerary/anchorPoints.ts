/**
 * Day anchor points
 *
 * Where a day starts and ends, taken from the authoritative trip facts
 * (lodging stays and flights) rather than from the model's output. Lodging
 * is evaluated first; flights may then fill or override the result. Records
 * without coordinates never produce an anchor and are never geocoded here.
 */

import { toIsoDate, toTimestamp } from "./dates";
import type { AccommodationFact, AnchorPoint, FlightFact, TripFacts } from "./types";

export interface DayAnchors {
  startPoint: AnchorPoint | null;
  endPoint: AnchorPoint | null;
}

function hasCoordinates(lat: number | null, lng: number | null): boolean {
  return lat !== null && lng !== null && Number.isFinite(lat) && Number.isFinite(lng);
}

export function lodgingAnchor(acc: AccommodationFact): AnchorPoint | null {
  if (acc.latitude === null || acc.longitude === null || !hasCoordinates(acc.latitude, acc.longitude)) return null;
  return {
    lat: acc.latitude,
    lng: acc.longitude,
    name: acc.address || acc.city,
    category: "住宿",
    type: "accommodation",
  };
}

export function arrivalAirportAnchor(flight: FlightFact): AnchorPoint | null {
  if (flight.arrivalLatitude === null || flight.arrivalLongitude === null) return null;
  if (!hasCoordinates(flight.arrivalLatitude, flight.arrivalLongitude)) return null;
  return {
    lat: flight.arrivalLatitude,
    lng: flight.arrivalLongitude,
    name: flight.arrivalAirport,
    category: "机场",
    type: "airport_arrival",
  };
}

export function departureAirportAnchor(flight: FlightFact): AnchorPoint | null {
  if (flight.departureLatitude === null || flight.departureLongitude === null) return null;
  if (!hasCoordinates(flight.departureLatitude, flight.departureLongitude)) return null;
  return {
    lat: flight.departureLatitude,
    lng: flight.departureLongitude,
    name: flight.departureAirport,
    category: "机场",
    type: "airport_departure",
  };
}

function applyLodging(currentDate: string, accommodations: AccommodationFact[], anchors: DayAnchors): void {
  for (const acc of accommodations) {
    const checkIn = toIsoDate(acc.checkInDate);
    if (!checkIn) continue;

    const point = lodgingAnchor(acc);
    if (!point) continue;

    const checkOut = toIsoDate(acc.checkOutDate);

    if (checkIn === currentDate) {
      anchors.startPoint = point;
      if (checkOut === currentDate) {
        anchors.endPoint = point;
      }
    } else if (checkOut === currentDate) {
      anchors.endPoint = point;
      anchors.startPoint ??= point;
    } else if (checkOut !== null && checkIn < currentDate && currentDate < checkOut) {
      anchors.startPoint ??= point;
      anchors.endPoint ??= point;
    }
  }
}

function applyFlights(currentDate: string, flights: FlightFact[], anchors: DayAnchors): void {
  for (const flight of flights) {
    if (toIsoDate(flight.arrivalTime) === currentDate && !anchors.startPoint) {
      anchors.startPoint = arrivalAirportAnchor(flight);
    }

    if (toIsoDate(flight.departureTime) === currentDate) {
      const departure = departureAirportAnchor(flight);
      if (departure) {
        anchors.endPoint = departure;
      }
    }
  }
}

function pickFlight(
  flights: FlightFact[],
  anchorOf: (flight: FlightFact) => AnchorPoint | null,
  timeOf: (flight: FlightFact) => number | null,
  prefer: "earliest" | "latest"
): AnchorPoint | null {
  let best: { time: number; point: AnchorPoint } | null = null;

  for (const flight of flights) {
    const point = anchorOf(flight);
    const time = timeOf(flight);
    if (!point || time === null) continue;

    const better = best === null
      || (prefer === "earliest" ? time < best.time : time > best.time);
    if (better) {
      best = { time, point };
    }
  }

  return best?.point ?? null;
}

/**
 * Start/end anchors for one day.
 * @param currentDate - YYYY-MM-DD of the day being planned
 */
export function deriveDayAnchors(
  currentDate: string,
  dayNumber: number,
  totalDays: number,
  facts: TripFacts
): DayAnchors {
  const anchors: DayAnchors = { startPoint: null, endPoint: null };

  applyLodging(currentDate, facts.accommodations, anchors);
  applyFlights(currentDate, facts.flights, anchors);

  if (dayNumber === 1 && !anchors.startPoint) {
    anchors.startPoint = pickFlight(
      facts.flights,
      departureAirportAnchor,
      (f) => toTimestamp(f.departureTime),
      "earliest"
    );
  }

  if (dayNumber === totalDays && !anchors.endPoint) {
    anchors.endPoint = pickFlight(
      facts.flights,
      arrivalAirportAnchor,
      (f) => toTimestamp(f.arrivalTime ?? f.departureTime),
      "latest"
    );
  }

  return anchors;
}
