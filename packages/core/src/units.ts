import type { CloudSnapshot } from "@sigenbridge/cloud-api";
import type { ModbusTcpStatus } from "@sigenbridge/local-gateway";

/**
 * Power reading in kW. The cloud reports W on some firmware and kW on
 * others; anything above 100 in magnitude is taken to be W.
 */
export function normalizePowerKw(value: number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return Math.abs(value) > 100 ? Math.round((value / 1000) * 100) / 100 : value;
}

function reading(value: number | null | undefined): number | null {
  return value ?? null;
}

export interface EnergyReadings {
  /** % */
  batterySoc: number | null;
  /** kW, negative while charging */
  batteryPowerKw: number | null;
  pvPowerKw: number | null;
  /** kW, positive while importing */
  gridPowerKw: number | null;
  loadPowerKw: number | null;
  /** kWh */
  dayGeneration: number | null;
  monthGeneration: number | null;
  yearGeneration: number | null;
  lifetimeGeneration: number | null;
}

export function toEnergyReadings(snapshot: CloudSnapshot): EnergyReadings {
  const { energyFlow, statistics } = snapshot;
  return {
    batterySoc: reading(energyFlow.batterySoc),
    batteryPowerKw: normalizePowerKw(energyFlow.batteryPower),
    pvPowerKw: normalizePowerKw(energyFlow.pvPower),
    gridPowerKw: normalizePowerKw(energyFlow.buySellPower),
    loadPowerKw: normalizePowerKw(energyFlow.loadPower),
    dayGeneration: reading(statistics.dayGeneration),
    monthGeneration: reading(statistics.monthGeneration),
    yearGeneration: reading(statistics.yearGeneration),
    lifetimeGeneration: reading(statistics.lifetimeGeneration),
  };
}

export interface ModbusReadings {
  enabled: boolean;
  port: number;
}

export function toModbusReadings(status: ModbusTcpStatus): ModbusReadings {
  return { enabled: status.modbusEnable === 1, port: status.modbusPort };
}
