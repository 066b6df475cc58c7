import { z } from "zod";

const Coordinate = z
  .number()
  .int({ message: "Coordinates must be integers" })
  .refine(Number.isSafeInteger, { message: "Coordinates must be safe integers" });

const Extent = z
  .number()
  .int({ message: "Extents must be integers" })
  .min(0, { message: "Extents must be non-negative" })
  .refine(Number.isSafeInteger, { message: "Extents must be safe integers" });

export const SizeSchema = z.object({
  width: Extent,
  height: Extent,
});

export const AreaSchema = z.object({
  x: Coordinate,
  y: Coordinate,
  width: Extent,
  height: Extent,
});
