import { HostGroup, ScenarioSettings } from "./settings.js";

describe("ScenarioSettings", () => {
    test("numbers groups and the map files they use", () => {
        const settings = new ScenarioSettings("demo")
            .addGroup(new HostGroup("t", "_").set("movementModel", "TransitMapMovement").set("nrofHosts", 2).setOkMap("a.wkt"))
            .addGroup(new HostGroup("S").set("nrofHosts", 3).setOkMap("a.wkt").setOkMap("b.wkt"))
            .completeGroups()
            .spacer();
        settings.set("Events1.hosts", `0,${settings.hostCount - 1}`);

        expect(settings.hostCount).toBe(5);
        expect(settings.toString()).toBe(
            [
                "Scenario.name = demo",
                "Scenario.nrofHostGroups = 2",
                "Group1.groupID = t_",
                "Group1.movementModel = TransitMapMovement",
                "Group1.nrofHosts = 2",
                "Group1.okMaps = 1",
                "Group2.groupID = S",
                "Group2.nrofHosts = 3",
                "Group2.okMaps = 1, 2",
                "",
                "MapBasedMovement.nrofMapFiles = 2",
                "MapBasedMovement.mapFile1 = a.wkt",
                "MapBasedMovement.mapFile2 = b.wkt",
                "",
                "Events1.hosts = 0,4",
                "",
            ].join("\n")
        );
    });

    test("no groups, no map files", () => {
        const settings = new ScenarioSettings("empty").completeGroups();
        expect(settings.hostCount).toBe(0);
        expect(settings.toString()).toBe("Scenario.name = empty\nScenario.nrofHostGroups = 0\n");
    });

    test("a group key set twice keeps the last value", () => {
        const group = new HostGroup("g").set("speed", 1).set("speed", 2);
        expect([...group.values]).toEqual([["groupID", "g"], ["speed", 2]]);
    });
});
