import {
  Counter,
  type CounterConfiguration,
  Histogram,
  type HistogramConfiguration,
  Registry,
} from 'prom-client'

type Labels<T> = Extract<keyof T, string>

/**
 * Registry that creates metrics already registered on itself, so every
 * metrics instance owns its own set instead of sharing prom-client's global
 * registry
 */
export class RegistryMetricCreator extends Registry {
  counter<T extends Record<string, string | number> = Record<string, never>>(
    configuration: Omit<CounterConfiguration<Labels<T>>, 'registers'>,
  ): Counter<Labels<T>> {
    return new Counter<Labels<T>>({ ...configuration, registers: [this] })
  }

  histogram<
    T extends Record<string, string | number> = Record<string, never>,
  >(
    configuration: Omit<HistogramConfiguration<Labels<T>>, 'registers'>,
  ): Histogram<Labels<T>> {
    return new Histogram<Labels<T>>({ ...configuration, registers: [this] })
  }
}
