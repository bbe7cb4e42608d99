// Shared types for agent requests and results

export type AgentStatus = "success" | "error";

export interface AgentResult<TData> {
  agent_name: string;
  task_id: string;
  status: AgentStatus;
  data: TData;
  insights: string[];
  recommendations: string[];
  timestamp: string; // ISO
  execution_time: number; // seconds
  confidence_score: number;
}

export interface ViewGeneratorRequest {
  required_metrics?: string[];
  heatwave?: {
    host?: string;
  };
  config?: {
    auto_optimization?: boolean;
    performance_monitoring?: boolean;
  };
}

// Returned when the adapter itself fails before an agent result exists
export interface AgentFailure {
  agent_name: string;
  status: "error";
  error: string;
  timestamp: string;
}

export interface HealthReport {
  status: "healthy" | "unhealthy";
  timestamp: string;
  heatwave: {
    connected: boolean;
    host: string;
    database: string;
    error?: string;
  };
}
